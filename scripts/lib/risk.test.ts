import { describe, expect, it } from 'vitest';
import { classifyRisk } from './risk';

describe('classifyRisk', () => {
  it('puts exactly 20 in Medium and anything above in High', () => {
    expect(classifyRisk(20)).toEqual({ category: 'Medium', prediction: 'Needs Monitoring' });
    expect(classifyRisk(20.01)).toEqual({ category: 'High', prediction: 'Needs Attention' });
  });

  it('puts exactly 10 in Low and anything above in Medium', () => {
    expect(classifyRisk(10)).toEqual({ category: 'Low', prediction: 'Stable' });
    expect(classifyRisk(10.01)).toEqual({ category: 'Medium', prediction: 'Needs Monitoring' });
  });

  it('covers the ends of the range', () => {
    expect(classifyRisk(0).category).toBe('Low');
    expect(classifyRisk(100).category).toBe('High');
  });
});
