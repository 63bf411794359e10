import { parseFormSchema } from '../../schema/index.js';
import type { FormSchema, SessionTimeouts } from '../../schema/index.js';

/** Three sections, six fields: the shape the session tests walk through. */
export const TEST_FORM: FormSchema = parseFormSchema({
  name: 'Test form',
  sections: [
    {
      id: 'about',
      title: 'About you',
      fields: [
        { id: 'consent', kind: 'consent', label: 'I agree' },
        {
          id: 'initials',
          kind: 'text',
          label: 'Initials',
          value: { type: 'initials', length: 2 },
          minLength: 2,
          maxLength: 2,
        },
        { id: 'team', kind: 'choice', label: 'Team', options: ['Red', 'Blue'] },
      ],
    },
    {
      id: 'scale',
      title: 'Scale',
      fields: [
        { id: 'q1', kind: 'choice', label: 'Question one', options: ['1', '2', '3'] },
        { id: 'q2', kind: 'choice', label: 'Question two', options: ['1', '2', '3'] },
      ],
    },
    {
      id: 'frequency',
      title: 'Frequency',
      fields: [
        { id: 'f1', kind: 'choice', label: 'Frequency one', options: ['Never', 'Often'] },
      ],
    },
  ],
});

export const TEST_TIMEOUTS: SessionTimeouts = {
  navigation: 1_000,
  field: 1_000,
  confirmation: 1_000,
  close: 1_000,
};

export const TEST_URL = 'https://forms.test/feedback';
