import { describe, expect, it } from 'vitest';
import { IntentClassifier, classifyIntent, createIntentClassifier } from './intent-classifier.js';

describe('IntentClassifier', () => {
  describe('directives', () => {
    it('parses @target: body', () => {
      expect(classifyIntent('@engineering: ship the release')).toEqual({
        type: 'directive',
        target: 'engineering',
        body: 'ship the release',
      });
    });

    it('accepts whitespace as the separator and trims the body', () => {
      expect(classifyIntent('@ops   deploy now  ')).toEqual({
        type: 'directive',
        target: 'ops',
        body: 'deploy now',
      });
    });

    it('keeps hyphens in target names', () => {
      expect(classifyIntent('@qa-team: run the suite')).toMatchObject({ target: 'qa-team' });
    });

    it('takes priority over every other rule', () => {
      expect(classifyIntent('@ops: status?').type).toBe('directive');
      expect(classifyIntent('@ops approve').type).toBe('directive');
    });

    it('requires a body after the target', () => {
      expect(classifyIntent('@ops').type).toBe('general');
    });
  });

  describe('decisions', () => {
    it('recognises bare approval tokens', () => {
      for (const input of ['approve', 'yes', 'ok', 'okay', 'LGTM', '  confirm  ']) {
        expect(classifyIntent(input)).toEqual({ type: 'decision', decision: 'approve', ref: '' });
      }
    });

    it('recognises bare rejection tokens', () => {
      for (const input of ['reject', 'no', 'Nope', 'deny']) {
        expect(classifyIntent(input)).toEqual({ type: 'decision', decision: 'reject', ref: '' });
      }
    });

    it('captures a reference with or without #', () => {
      expect(classifyIntent('approve #abc123')).toEqual({
        type: 'decision',
        decision: 'approve',
        ref: 'abc123',
      });
      expect(classifyIntent('APPROVED abc')).toEqual({ type: 'decision', decision: 'approve', ref: 'abc' });
      expect(classifyIntent('reject 12ab')).toEqual({ type: 'decision', decision: 'reject', ref: '12ab' });
    });

    it('matches a leading decision word and ignores trailing text', () => {
      expect(classifyIntent('approve abc123 please')).toEqual({
        type: 'decision',
        decision: 'approve',
        ref: 'abc123',
      });
      expect(classifyIntent('yes, go ahead')).toEqual({ type: 'decision', decision: 'approve', ref: '' });
      expect(classifyIntent('reject #r-9 too costly')).toEqual({ type: 'decision', decision: 'reject', ref: 'r-9' });
      expect(classifyIntent('approve?')).toEqual({ type: 'decision', decision: 'approve', ref: '' });
    });

    it('requires the decision word to end at a word boundary', () => {
      expect(classifyIntent('nobody knows').type).toBe('general');
      expect(classifyIntent('yesterday went fine').type).toBe('general');
      expect(classifyIntent('okayish results?').type).toBe('query');
    });
  });

  describe('queries', () => {
    it('matches query keywords', () => {
      expect(classifyIntent('status').type).toBe('query');
      expect(classifyIntent('How is the launch going').type).toBe('query');
      expect(classifyIntent('any progress').type).toBe('query');
    });

    it('matches questions', () => {
      expect(classifyIntent('is it done?').type).toBe('query');
    });
  });

  it('falls back to general', () => {
    expect(classifyIntent('hello there')).toEqual({ type: 'general' });
    expect(classifyIntent('')).toEqual({ type: 'general' });
  });

  describe('configuration', () => {
    it('uses custom token sets', () => {
      const classifier = createIntentClassifier({ approveTokens: ['ship it'], rejectTokens: ['hold'] });

      expect(classifier.classify('ship it')).toEqual({ type: 'decision', decision: 'approve', ref: '' });
      expect(classifier.classify('hold #r1')).toEqual({ type: 'decision', decision: 'reject', ref: 'r1' });
      expect(classifier.classify('yes').type).toBe('general');
    });

    it('rejects overlapping token sets', () => {
      expect(() => new IntentClassifier({ approveTokens: ['yes'], rejectTokens: ['YES'] })).toThrow(
        'Approve and reject tokens overlap: yes'
      );
    });

    it('rejects empty token sets', () => {
      expect(() => new IntentClassifier({ approveTokens: ['  '] })).toThrow(
        'Approve and reject token sets must not be empty'
      );
    });

    it('returns normalised copies of its options', () => {
      const classifier = new IntentClassifier({ approveTokens: [' Go ', 'go'], rejectTokens: ['stop'] });
      const options = classifier.getOptions();

      expect(options.approveTokens).toEqual(['go']);
      options.approveTokens.push('mutated');
      expect(classifier.getOptions().approveTokens).toEqual(['go']);
    });
  });
});
