import { z } from 'zod';

export const MAX_OPTIONS = 4;
export const NO_EXPLANATION = 'No explanation available.';

export interface Question {
  index: number;
  text: string;
  /** Option number (1-based) to option text, in option order. */
  options: ReadonlyMap<number, string>;
  /** 0 when the source cell could not be read as a number. */
  correctOption: number;
  explanations: ReadonlyMap<number, string>;
}

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const questionRowsSchema = z.array(z.record(z.string(), cellSchema));

export type QuestionRow = z.infer<typeof questionRowsSchema>[number];

export interface ParsedRows {
  questions: Question[];
  skipped: { row: number; reason: string }[];
}

function cellText(row: QuestionRow, column: string): string | undefined {
  const value = row[column];
  if (value === undefined || value === null) return undefined;
  const text = String(value).trim();
  return text === '' ? undefined : text;
}

function parseOptionNumber(row: QuestionRow): number {
  const value = row['Correct Option'];
  const parsed = typeof value === 'number' ? value : Number(cellText(row, 'Correct Option'));
  return Number.isInteger(parsed) ? parsed : 0;
}

/**
 * Turns spreadsheet-style rows into questions. Rows without a prompt or
 * without a single option are skipped; every other gap is filled here so
 * nothing downstream has to probe for missing cells.
 */
export function parseQuestionRows(rows: readonly QuestionRow[]): ParsedRows {
  const questions: Question[] = [];
  const skipped: ParsedRows['skipped'] = [];

  rows.forEach((row, rowIndex) => {
    const firstColumn = Object.keys(row)[0];
    const text =
      cellText(row, 'Question') ??
      (firstColumn === undefined ? undefined : cellText(row, firstColumn));
    if (!text) {
      skipped.push({ row: rowIndex, reason: 'no question text' });
      return;
    }

    const options = new Map<number, string>();
    for (let number = 1; number <= MAX_OPTIONS; number++) {
      const option = cellText(row, `Option ${number}`);
      if (option) options.set(number, option);
    }
    if (options.size === 0) {
      skipped.push({ row: rowIndex, reason: 'no options' });
      return;
    }

    const correctOption = parseOptionNumber(row);

    const explanations = new Map<number, string>();
    const explained = new Set([...options.keys(), correctOption]);
    for (const number of explained) {
      if (number < 1) continue;
      explanations.set(number, cellText(row, `Explanation ${number}`) ?? NO_EXPLANATION);
    }

    questions.push({
      index: questions.length,
      text,
      options,
      correctOption,
      explanations,
    });
  });

  return { questions, skipped };
}
