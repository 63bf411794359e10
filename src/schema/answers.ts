import { z } from 'zod';

// ── FieldAnswer ───────────────────────────────────────────────

export const fieldAnswerSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('text'),
    fieldId: z.string().min(1),
    value: z.string(),
  }),
  z.object({
    kind: z.literal('choice'),
    fieldId: z.string().min(1),
    option: z.string().min(1),
  }),
  z.object({
    kind: z.literal('consent'),
    fieldId: z.string().min(1),
  }),
]);

export type FieldAnswer = z.infer<typeof fieldAnswerSchema>;

// ── AnswerSet ─────────────────────────────────────────────────
// One entry per form section, in form order. The first section carries
// the participant information; later sections are choice sequences.

export const sectionAnswersSchema = z.object({
  sectionId: z.string().min(1),
  answers: z.array(fieldAnswerSchema),
});

export type SectionAnswers = z.infer<typeof sectionAnswersSchema>;

export const answerSetSchema = z.object({
  sections: z.array(sectionAnswersSchema).min(1),
});

export type AnswerSet = z.infer<typeof answerSetSchema>;

// ── Views ─────────────────────────────────────────────────────

/** Answers of the first section keyed by field id. Consent reads as "yes". */
export function participantInfo(set: AnswerSet): Record<string, string> {
  const info: Record<string, string> = {};
  for (const answer of set.sections[0]?.answers ?? []) {
    info[answer.fieldId] = answerText(answer);
  }
  return info;
}

/** Ordered choice values of the section at `sectionIndex`. */
export function choiceSequence(set: AnswerSet, sectionIndex: number): string[] {
  const section = set.sections[sectionIndex];
  if (!section) return [];
  return section.answers.flatMap((a) => (a.kind === 'choice' ? [a.option] : []));
}

export function answerText(answer: FieldAnswer): string {
  switch (answer.kind) {
    case 'text':
      return answer.value;
    case 'choice':
      return answer.option;
    case 'consent':
      return 'yes';
  }
}
