import type {
  AnswerSet,
  FieldAnswer,
  FieldSpec,
  FormSchema,
  TextField,
  TextValueSpec,
} from '../schema/index.js';

// ── Random source ────────────────────────────────────────────
// Returns a float in [0, 1). Math.random by default; tests pass a seeded one.

export type RandomSource = () => number;

const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const LOWER = 'abcdefghijklmnopqrstuvwxyz';

// ── Public API ───────────────────────────────────────────────

/**
 * Build one answer set for `form`. Pure apart from `random`: no I/O and
 * no shared state, so every attempt can call it independently.
 */
export function generateAnswers(
  form: FormSchema,
  random: RandomSource = Math.random,
): AnswerSet {
  return {
    sections: form.sections.map((section) => ({
      sectionId: section.id,
      answers: section.fields.map((field) => answerFor(field, random)),
    })),
  };
}

/** True when `answer` is a legal value for `field`. */
export function isAnswerInDomain(field: FieldSpec, answer: FieldAnswer): boolean {
  if (answer.fieldId !== field.id) return false;

  switch (field.kind) {
    case 'text':
      return (
        answer.kind === 'text' &&
        answer.value.length >= field.minLength &&
        answer.value.length <= field.maxLength
      );
    case 'choice':
      return answer.kind === 'choice' && field.options.includes(answer.option);
    case 'consent':
      return answer.kind === 'consent';
  }
}

/** Deterministic PRNG (mulberry32) for reproducible answer sets. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// ── Per-field answers ────────────────────────────────────────

function answerFor(field: FieldSpec, random: RandomSource): FieldAnswer {
  switch (field.kind) {
    case 'text':
      return { kind: 'text', fieldId: field.id, value: textValue(field, random) };
    case 'choice':
      return { kind: 'choice', fieldId: field.id, option: pick(field.options, random) };
    case 'consent':
      return { kind: 'consent', fieldId: field.id };
  }
}

function textValue(field: TextField, random: RandomSource): string {
  const value = rawTextValue(field.value, random);
  // Load-time refinements keep generators inside the bounds; the clamp
  // covers a schema built in code without going through parseFormSchema.
  return value.length > field.maxLength ? value.slice(0, field.maxLength) : value;
}

function rawTextValue(spec: TextValueSpec, random: RandomSource): string {
  switch (spec.type) {
    case 'initials':
      return letters(UPPER, spec.length, random);
    case 'letters':
      return letters(LOWER, integer(spec.length.min, spec.length.max, random), random);
    case 'email': {
      const localLength = integer(spec.localLength.min, spec.localLength.max, random);
      return `${letters(LOWER, localLength, random)}@${pick(spec.domains, random)}`;
    }
    case 'integer':
      return `${String(integer(spec.min, spec.max, random))}${spec.suffix ?? ''}`;
    case 'pick':
      return pick(spec.values, random);
    case 'literal':
      return spec.value;
  }
}

// ── Primitives ───────────────────────────────────────────────

/** Uniform integer in [min, max]. */
function integer(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick(values: readonly string[], random: RandomSource): string {
  const value = values[Math.floor(random() * values.length)];
  if (value === undefined) {
    throw new RangeError('Cannot pick from an empty list');
  }
  return value;
}

function letters(alphabet: string, length: number, random: RandomSource): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += alphabet.charAt(Math.floor(random() * alphabet.length));
  }
  return out;
}
