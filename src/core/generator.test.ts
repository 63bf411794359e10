import { describe, expect, test } from 'vitest';

import { BUNDLED_FORM_PATH, loadFormSchema } from '../config/index.js';
import { answerSetSchema, choiceSequence, participantInfo } from '../schema/index.js';
import type { FormSchema, TextValueSpec } from '../schema/index.js';
import { generateAnswers, isAnswerInDomain, seededRandom } from './generator.js';
import { TEST_FORM } from './__fixtures__/form.js';

// ── Helpers ──────────────────────────────────────────────────

function allInDomain(form: FormSchema, seed: number): boolean {
  const set = generateAnswers(form, seededRandom(seed));
  return form.sections.every((section, s) =>
    section.fields.every((field, f) => {
      const answer = set.sections[s]?.answers[f];
      return answer !== undefined && isAnswerInDomain(field, answer);
    }),
  );
}

// ── Tests ────────────────────────────────────────────────────

describe('generateAnswers', () => {
  test('lowest draw picks the first value everywhere', () => {
    const set = generateAnswers(TEST_FORM, () => 0);

    expect(set).toEqual({
      sections: [
        {
          sectionId: 'about',
          answers: [
            { kind: 'consent', fieldId: 'consent' },
            { kind: 'text', fieldId: 'initials', value: 'AA' },
            { kind: 'choice', fieldId: 'team', option: 'Red' },
          ],
        },
        {
          sectionId: 'scale',
          answers: [
            { kind: 'choice', fieldId: 'q1', option: '1' },
            { kind: 'choice', fieldId: 'q2', option: '1' },
          ],
        },
        {
          sectionId: 'frequency',
          answers: [{ kind: 'choice', fieldId: 'f1', option: 'Never' }],
        },
      ],
    });
  });

  test('highest draw picks the last value everywhere', () => {
    const set = generateAnswers(TEST_FORM, () => 0.999);

    expect(participantInfo(set)).toEqual({ consent: 'yes', initials: 'ZZ', team: 'Blue' });
    expect(choiceSequence(set, 1)).toEqual(['3', '3']);
    expect(choiceSequence(set, 2)).toEqual(['Often']);
  });

  test('choiceSequence of a missing section is empty', () => {
    const set = generateAnswers(TEST_FORM, () => 0);
    expect(choiceSequence(set, 7)).toEqual([]);
  });

  test('output validates against the answer set schema', () => {
    const set = generateAnswers(TEST_FORM, seededRandom(7));
    expect(answerSetSchema.safeParse(set).success).toBe(true);
  });

  test('same seed yields the same answer set', () => {
    expect(generateAnswers(TEST_FORM, seededRandom(42))).toEqual(
      generateAnswers(TEST_FORM, seededRandom(42)),
    );
  });

  test('every answer stays inside its field domain across seeds', () => {
    for (let seed = 1; seed <= 200; seed++) {
      expect(allInDomain(TEST_FORM, seed)).toBe(true);
    }
  });

  test('bundled form generates in-domain answers', async () => {
    const form = await loadFormSchema(BUNDLED_FORM_PATH);
    for (let seed = 1; seed <= 200; seed++) {
      expect(allInDomain(form, seed)).toBe(true);
    }
  });

  // ── Text generators ────────────────────────────────────────

  describe('text generators', () => {
    function singleTextForm(value: TextValueSpec, maxLength = 200): FormSchema {
      // Built directly: parseFormSchema would reject an oversized literal
      // before the clamp could be observed.
      return {
        name: 'Text only',
        marker: 'form',
        confirmation: { phrases: ['Thanks'] },
        navigation: { next: ['Next'], submit: ['Submit'] },
        sections: [
          {
            id: 's',
            title: 'S',
            fields: [{ id: 't', kind: 'text', label: 'T', value, minLength: 0, maxLength }],
          },
        ],
      };
    }

    const EMAIL: TextValueSpec = {
      type: 'email',
      domains: ['example.com'],
      localLength: { min: 5, max: 10 },
    };
    const INTEGER: TextValueSpec = { type: 'integer', min: 3, max: 9, suffix: ' yrs' };
    const LITERAL: TextValueSpec = { type: 'literal', value: 'abcdefghij' };

    function onlyText(form: FormSchema, random: () => number): string {
      const answer = generateAnswers(form, random).sections[0]?.answers[0];
      if (answer?.kind !== 'text') throw new Error('expected a text answer');
      return answer.value;
    }

    test('email uses the shortest local part on the lowest draw', () => {
      expect(onlyText(singleTextForm(EMAIL), () => 0)).toBe('aaaaa@example.com');
    });

    test('integer carries its suffix', () => {
      expect(onlyText(singleTextForm(INTEGER), () => 0)).toBe('3 yrs');
      expect(onlyText(singleTextForm(INTEGER), () => 0.999)).toBe('9 yrs');
    });

    test('values longer than maxLength are clamped', () => {
      expect(onlyText(singleTextForm(LITERAL, 4), () => 0)).toBe('abcd');
    });
  });
});

describe('isAnswerInDomain', () => {
  const team = TEST_FORM.sections[0]?.fields[2];

  test('rejects an option the field does not offer', () => {
    if (team === undefined) throw new Error('fixture changed');
    expect(isAnswerInDomain(team, { kind: 'choice', fieldId: 'team', option: 'Green' })).toBe(false);
    expect(isAnswerInDomain(team, { kind: 'choice', fieldId: 'team', option: 'Red' })).toBe(true);
  });

  test('rejects an answer for another field', () => {
    if (team === undefined) throw new Error('fixture changed');
    expect(isAnswerInDomain(team, { kind: 'choice', fieldId: 'q1', option: 'Red' })).toBe(false);
  });
});
