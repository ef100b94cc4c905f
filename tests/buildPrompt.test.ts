import { describe, expect, it } from 'vitest';
import { buildMessages, buildPrompt, formatAvoidList } from '../src/engine/buildPrompt';
import { DEFAULT_BRIEF, systemRole } from '../src/prompts/system';

const segment = { title: 'Pet food manufacturers', description: 'Dog and cat food' };

describe('formatAvoidList', () => {
  it('sorts and deduplicates names', () => {
    expect(formatAvoidList(['Beta', 'Alpha', 'Beta'], 100)).toBe('Alpha; Beta');
  });

  it('truncates to the character cap', () => {
    expect(formatAvoidList(['alpha', 'beta'], 8)).toBe('alpha; b');
    expect(formatAvoidList(['alpha'], 0)).toBe('');
  });
});

describe('buildPrompt', () => {
  const prompt = buildPrompt(segment, ['Beta Pets', 'Alpha Pets'], { batchSize: 25, maxAvoidChars: 6000 });

  it('names the segment and the batch size', () => {
    expect(prompt).toContain('Segment: Pet food manufacturers\nDescription: Dog and cat food');
    expect(prompt).toContain('Name 25 new, real companies in this segment that could buy or use pea protein.');
  });

  it('asks for the six CSV columns', () => {
    expect(prompt).toContain('\nCompany,Segment,Country/Region,WhyRelevant,Website,Priority\n');
  });

  it('ends with the avoid list', () => {
    expect(prompt.endsWith('Avoid these companies (already collected):\nAlpha Pets; Beta Pets')).toBe(true);
  });

  it('uses a custom brief', () => {
    const custom = buildPrompt(segment, [], {
      batchSize: 5,
      maxAvoidChars: 100,
      brief: { ...DEFAULT_BRIEF, product: 'faba bean protein' }
    });
    expect(custom).toContain('could buy or use faba bean protein.');
    expect(custom.endsWith('Avoid these companies (already collected):')).toBe(true);
  });
});

describe('buildMessages', () => {
  it('pairs the system role with the user prompt', () => {
    const messages = buildMessages(segment, [], { batchSize: 5, maxAvoidChars: 100 });
    expect(messages.map(m => m.role)).toEqual(['system', 'user']);
    expect(messages[0].content).toBe(systemRole());
    expect(messages[1].content).toBe(buildPrompt(segment, [], { batchSize: 5, maxAvoidChars: 100 }));
  });
});
