/**
 * Prompt Builder - renders one dataset item into the instruction sent with its image
 */

import type { DatasetItem } from '../dataset/loader';

export const OPTION_LABELS = ['A', 'B', 'C', 'D', 'E'] as const;

const FORMAT_INSTRUCTIONS =
  'Place your thinking between <thinking> and </thinking> tags and then answer between <answer> and </answer> tags.';

export const PROMPT_PREFIXES = {
  MULTIPLE_CHOICE:
    'Think, and then answer. IMPORTANT: This is multiple choice. Answer with A, B, C, D, or E (e.g. <answer>B</answer>). ' +
    FORMAT_INSTRUCTIONS,
  NUMERIC:
    'Think, and then answer. IMPORTANT: Answer with only a single number (e.g. <answer>6</answer>). ' +
    FORMAT_INSTRUCTIONS,
} as const;

/** Remove inline `<imageN>` placeholders (and the newline before them) */
export function cleanQuestion(question: string): string {
  return question.replace(/\n?<image\d+>/g, '');
}

export function formatOptions(options: readonly string[]): string {
  const labels = OPTION_LABELS.slice(0, options.length);
  const alreadyLabels = options.length === labels.length && options.every((opt, i) => opt === labels[i]);
  if (alreadyLabels) {
    return options.join(', ');
  }
  return options.map((opt, i) => `${OPTION_LABELS[i] ?? String(i + 1)}) ${opt}`).join(', ');
}

export function buildPrompt(item: Pick<DatasetItem, 'question' | 'options'>): string {
  const question = cleanQuestion(item.question);

  if (item.options.length > 0) {
    return `${PROMPT_PREFIXES.MULTIPLE_CHOICE} ${question}\nOptions: ${formatOptions(item.options)}`;
  }
  return `${PROMPT_PREFIXES.NUMERIC} ${question}`;
}
