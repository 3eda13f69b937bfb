import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';

import { AppConfig } from '../config/configuration';
import { parseQuestionRows, Question, questionRowsSchema } from './question';
import { ContentUnavailableError, describeError, OutOfRangeError } from './quiz.errors';

/**
 * Reads the question file (a spreadsheet exported as an array of row objects)
 * and parses it into questions.
 */
export function loadQuestionFile(filePath: string, logger?: Logger): Question[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ContentUnavailableError(`Cannot read question file ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const rows = questionRowsSchema.safeParse(raw);
  if (!rows.success) {
    throw new ContentUnavailableError(
      `Question file ${filePath} is not a list of rows: ${rows.error.issues[0]?.message ?? 'invalid shape'}`,
    );
  }

  const { questions, skipped } = parseQuestionRows(rows.data);
  for (const { row, reason } of skipped) {
    logger?.warn(`⚠️ Skipping row ${row}: ${reason}`);
  }
  return questions;
}

@Injectable()
export class QuestionBankService {
  private readonly logger = new Logger(QuestionBankService.name);
  private readonly questions: readonly Question[];

  constructor(config: ConfigService<AppConfig, true>) {
    this.questions = this.load(config.get('QUIZ_FILE', { infer: true }));
  }

  private load(file: string): readonly Question[] {
    const quizPath = path.resolve(process.cwd(), file);
    this.logger.log(`📂 Loading questions from ${quizPath}`);

    try {
      const questions = loadQuestionFile(quizPath, this.logger);
      if (questions.length === 0) {
        this.logger.warn('⚠️ Question file has no usable rows; quiz starts will report no content');
      } else {
        this.logger.log(`✅ Loaded ${questions.length} questions`);
      }
      return Object.freeze(questions);
    } catch (error) {
      this.logger.error(`❌ ${describeError(error)}`);
      return [];
    }
  }

  count(): number {
    return this.questions.length;
  }

  get(index: number): Question {
    const question = Number.isInteger(index) ? this.questions[index] : undefined;
    if (!question) {
      throw new OutOfRangeError(index, this.questions.length);
    }
    return question;
  }
}
