import { z } from 'zod';

// ── SelectorHint ──────────────────────────────────────────────

// A field with an explicit hint is located by it; without one, by the
// question container whose text holds the label.

export const fieldRoleSchema = z.enum([
  'textbox',
  'spinbutton',
  'combobox',
  'radiogroup',
  'radio',
  'checkbox',
]);

export const selectorHintSchema = z.discriminatedUnion('strategy', [
  z.object({ strategy: z.literal('testid'), value: z.string().min(1) }),
  z.object({ strategy: z.literal('role'), role: fieldRoleSchema, name: z.string().min(1).optional() }),
  z.object({ strategy: z.literal('css'), value: z.string().min(1) }),
]);

export type SelectorHint = z.infer<typeof selectorHintSchema>;

// ── Text value generators ─────────────────────────────────────

const lengthRangeSchema = z
  .object({
    min: z.number().int().positive(),
    max: z.number().int().positive(),
  })
  .refine((r) => r.min <= r.max, { message: 'min must not exceed max' });

export const textValueSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('initials'),
    length: z.number().int().positive().default(2),
  }),
  z.object({
    type: z.literal('letters'),
    length: lengthRangeSchema,
  }),
  z.object({
    type: z.literal('email'),
    domains: z.array(z.string().min(1)).min(1),
    localLength: lengthRangeSchema.default({ min: 5, max: 10 }),
  }),
  z.object({
    type: z.literal('integer'),
    min: z.number().int(),
    max: z.number().int(),
    suffix: z.string().optional(),
  }),
  z.object({
    type: z.literal('pick'),
    values: z.array(z.string().min(1)).min(1),
  }),
  z.object({
    type: z.literal('literal'),
    value: z.string(),
  }),
]);

export type TextValueSpec = z.infer<typeof textValueSchema>;

// ── Fields ────────────────────────────────────────────────────

const baseField = {
  id: z.string().min(1),
  label: z.string().min(1),
  selector: selectorHintSchema.optional(),
};

export const textFieldSchema = z.object({
  ...baseField,
  kind: z.literal('text'),
  value: textValueSchema,
  minLength: z.number().int().nonnegative().default(0),
  maxLength: z.number().int().positive().default(200),
});

export const choiceFieldSchema = z.object({
  ...baseField,
  kind: z.literal('choice'),
  options: z.array(z.string().min(1)).min(1),
});

export const consentFieldSchema = z.object({
  ...baseField,
  kind: z.literal('consent'),
});

export const fieldSchema = z.discriminatedUnion('kind', [
  textFieldSchema,
  choiceFieldSchema,
  consentFieldSchema,
]);

export type TextField = z.infer<typeof textFieldSchema>;
export type ChoiceField = z.infer<typeof choiceFieldSchema>;
export type ConsentField = z.infer<typeof consentFieldSchema>;
export type FieldSpec = z.infer<typeof fieldSchema>;

// ── Sections ──────────────────────────────────────────────────

export const sectionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  fields: z.array(fieldSchema).min(1),
});

export type SectionSpec = z.infer<typeof sectionSchema>;

// ── Whole form ────────────────────────────────────────────────

export const formSchema = z
  .object({
    name: z.string().min(1),
    marker: z.string().min(1).default('form'),
    confirmation: z
      .object({
        phrases: z.array(z.string().min(1)).min(1),
        urlIncludes: z.string().min(1).optional(),
      })
      .default({ phrases: ['Your response has been recorded'] }),
    navigation: z
      .object({
        next: z.array(z.string().min(1)).min(1).default(['Next']),
        submit: z.array(z.string().min(1)).min(1).default(['Submit']),
      })
      .default({}),
    sections: z.array(sectionSchema).min(1),
  })
  .superRefine((form, ctx) => {
    const sectionIds = new Set<string>();
    const fieldIds = new Set<string>();

    form.sections.forEach((section, s) => {
      if (sectionIds.has(section.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sections', s, 'id'],
          message: `Duplicate section id "${section.id}"`,
        });
      }
      sectionIds.add(section.id);

      section.fields.forEach((field, f) => {
        const path = ['sections', s, 'fields', f];
        if (fieldIds.has(field.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, 'id'],
            message: `Duplicate field id "${field.id}"`,
          });
        }
        fieldIds.add(field.id);

        if (field.kind === 'text') {
          for (const issue of textDomainIssues(field)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [...path, 'value'],
              message: issue,
            });
          }
        }
      });
    });
  });

export type FormSchema = z.infer<typeof formSchema>;

// ── Domain checks ─────────────────────────────────────────────
// A text field's generator must be able to produce only values inside
// [minLength, maxLength]. Checked once at load time.

function textDomainIssues(field: TextField): string[] {
  const issues: string[] = [];
  const { minLength, maxLength } = field;

  if (minLength > maxLength) {
    issues.push(`minLength ${String(minLength)} exceeds maxLength ${String(maxLength)}`);
    return issues;
  }

  const fits = (len: number): boolean => len >= minLength && len <= maxLength;
  const spec = field.value;

  switch (spec.type) {
    case 'initials':
      if (!fits(spec.length)) issues.push('initials length is outside the field bounds');
      break;
    case 'letters':
      if (!fits(spec.length.min) || !fits(spec.length.max)) {
        issues.push('letters length range is outside the field bounds');
      }
      break;
    case 'email': {
      const longestDomain = Math.max(...spec.domains.map((d) => d.length));
      const shortestDomain = Math.min(...spec.domains.map((d) => d.length));
      if (!fits(spec.localLength.max + 1 + longestDomain) || !fits(spec.localLength.min + 1 + shortestDomain)) {
        issues.push('generated e-mail addresses can fall outside the field bounds');
      }
      break;
    }
    case 'integer': {
      if (spec.min > spec.max) {
        issues.push('integer min must not exceed max');
        break;
      }
      const suffix = spec.suffix ?? '';
      const widths = [String(spec.min).length, String(spec.max).length];
      if (!widths.every((w) => fits(w + suffix.length))) {
        issues.push('generated integers can fall outside the field bounds');
      }
      break;
    }
    case 'pick':
      for (const value of spec.values) {
        if (!fits(value.length)) issues.push(`pick value "${value}" is outside the field bounds`);
      }
      break;
    case 'literal':
      if (!fits(spec.value.length)) issues.push('literal value is outside the field bounds');
      break;
  }

  return issues;
}

// ── Validators ────────────────────────────────────────────────

export function parseFormSchema(data: unknown): FormSchema {
  return formSchema.parse(data);
}
