import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import type { Env } from '../config/configuration';
import { describeError } from './quiz.errors';
import type { QuizQuestion } from './session';

const questionSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
  options: z.array(z.string().trim().min(1)).default([]),
});

const quizFileSchema = z.object({
  quiz: z.array(questionSchema).min(1),
});

export const SAMPLE_QUIZ_NAME = 'sample';

const sampleQuestions: QuizQuestion[] = [
  { text: 'What is the capital of France?', answer: 'Paris', options: [] },
  { text: 'What is 2 + 2?', answer: '4', options: [] },
  { text: 'What language is this bot written in?', answer: 'TypeScript', options: [] },
];

/**
 * Question sets loaded from `<QUIZ_DIRECTORY>/*.json`, keyed by file name
 * without the extension. Files that fail validation are skipped and reported
 * through {@link getLoadErrors}. When nothing loads, a small sample quiz is
 * served from memory so the bot stays usable.
 */
@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);
  private readonly questionSets = new Map<string, readonly QuizQuestion[]>();
  private loadErrors: string[] = [];
  private sampleActive = false;

  constructor(private readonly config: ConfigService<Env, true>) {
    this.reload();
  }

  reload(): void {
    const directory = path.resolve(this.config.get('QUIZ_DIRECTORY', { infer: true }));
    this.questionSets.clear();
    this.loadErrors = [];
    this.sampleActive = false;

    this.logger.log(`Loading quizzes from ${directory}`);
    for (const file of this.listQuizFiles(directory)) {
      this.loadFile(path.join(directory, file));
    }

    if (this.questionSets.size === 0) {
      this.questionSets.set(SAMPLE_QUIZ_NAME, freezeQuestions(sampleQuestions));
      this.sampleActive = true;
      this.logger.warn(`No valid quiz files found in ${directory}, serving the built-in sample quiz`);
    }

    if (this.loadErrors.length > 0) {
      this.logger.warn(`Encountered ${this.loadErrors.length} error(s) while loading quizzes`);
    }
    this.logger.log(`Quizzes available: ${this.listNames().join(', ')}`);
  }

  listNames(): string[] {
    return [...this.questionSets.keys()].sort();
  }

  exists(name: string): boolean {
    return this.questionSets.has(name);
  }

  getQuestions(name: string): readonly QuizQuestion[] | undefined {
    return this.questionSets.get(name);
  }

  getQuestionCount(name: string): number {
    return this.questionSets.get(name)?.length ?? 0;
  }

  getLoadErrors(): string[] {
    return [...this.loadErrors];
  }

  isSampleActive(): boolean {
    return this.sampleActive;
  }

  private listQuizFiles(directory: string): string[] {
    try {
      return fs
        .readdirSync(directory)
        .filter((file) => file.toLowerCase().endsWith('.json'))
        .sort();
    } catch (error) {
      this.loadErrors.push(`Cannot read quiz directory ${directory}: ${describeError(error)}`);
      return [];
    }
  }

  private loadFile(file: string): void {
    const fileName = path.basename(file);
    const name = path.basename(file, path.extname(file));

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      this.reject(fileName, describeError(error));
      return;
    }

    const parsed = quizFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.reject(
        fileName,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      );
      return;
    }

    const questions = parsed.data.quiz.map((q) => ({ text: q.question, answer: q.answer, options: q.options }));
    this.questionSets.set(name, freezeQuestions(questions));
    this.logger.log(`Loaded quiz "${name}" with ${questions.length} questions`);
  }

  private reject(fileName: string, reason: string): void {
    this.loadErrors.push(`${fileName}: ${reason}`);
    this.logger.error(`Skipping ${fileName}: ${reason}`);
  }
}

function freezeQuestions(questions: QuizQuestion[]): readonly QuizQuestion[] {
  return Object.freeze(
    questions.map((q) => Object.freeze({ text: q.text, answer: q.answer, options: Object.freeze([...q.options]) })),
  );
}
