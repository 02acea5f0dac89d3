import { describe, it, expect } from 'vitest';
import { repairJSON } from '../lib/json-repair.js';

describe('repairJSON', () => {
  it('parses clean JSON as-is', () => {
    expect(repairJSON('{"score": 0.8, "recommendation": "approve"}')).toEqual({ score: 0.8, recommendation: 'approve' });
  });

  it('strips markdown fences', () => {
    expect(repairJSON('```json\n{"score": 0.8}\n```')).toEqual({ score: 0.8 });
  });

  it('cuts the object out of surrounding prose and drops trailing commas', () => {
    const text = 'Here is my evaluation: {"score": 0.8, "tags": ["a",]} Hope this helps.';
    expect(repairJSON(text)).toEqual({ score: 0.8, tags: ['a'] });
  });

  it('closes a truncated response', () => {
    expect(repairJSON('{"score": 0.8, "concerns": ["slow", "vague"')).toEqual({ score: 0.8, concerns: ['slow', 'vague'] });
  });

  it('drops a dangling comma before closing a truncated response', () => {
    expect(repairJSON('{"a": 1, "b": [1, 2,')).toEqual({ a: 1, b: [1, 2] });
  });

  it('returns null when there is no JSON', () => {
    expect(repairJSON('I cannot evaluate this application.')).toBeNull();
    expect(repairJSON('   ')).toBeNull();
  });
});
