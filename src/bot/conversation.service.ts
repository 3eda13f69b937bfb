import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';

import { NO_EXPLANATION, Question } from '../quiz/question';
import { QuestionBankService } from '../quiz/question-bank.service';
import { describeError } from '../quiz/quiz.errors';
import { Session } from '../quiz/session';
import { SessionStoreService } from '../quiz/session-store.service';
import {
  renderCompletion,
  renderCorrect,
  renderGreeting,
  renderIncorrect,
  renderNoContent,
  renderQuestion,
  START_QUIZ_ID,
} from './message-renderer';
import { Messenger, MESSENGER, RenderedMessage, sendRendered } from './messenger';
import { ParsedEvent } from './webhook-event';

type UserEvent = Exclude<ParsedEvent, { kind: 'unrecognized' }>;

/**
 * The quiz conversation. Each event is decided and applied inside the user's
 * session lock; the resulting messages go out only after the session commits,
 * on a per-user delivery chain that `handle` does not wait for.
 */
@Injectable()
export class ConversationService implements OnApplicationShutdown {
  private readonly logger = new Logger(ConversationService.name);
  private readonly deliveries = new Map<string, Promise<void>>();

  constructor(
    private readonly bank: QuestionBankService,
    private readonly sessions: SessionStoreService,
    @Inject(MESSENGER) private readonly messenger: Messenger,
  ) {}

  /**
   * Resolves once the session change is committed; outbound messages are
   * still in flight. Never rejects: bad events and failed sends are logged
   * and dropped.
   */
  async handle(event: ParsedEvent): Promise<void> {
    if (event.kind === 'unrecognized') {
      this.logger.warn(`⚠️ Ignoring webhook event: ${event.reason}`);
      return;
    }
    const userEvent: UserEvent = event;

    this.logger.log(
      `📩 ${event.kind === 'text' ? `Text "${event.body}"` : `Reply "${event.replyId}"`} from ${event.from}`,
    );

    let outbox: RenderedMessage[];
    try {
      outbox = await this.sessions.update(event.from, (session) => this.transition(session, userEvent));
    } catch (error) {
      this.logger.error(`❌ Could not process event from ${event.from}: ${describeError(error)}`);
      return;
    }

    if (outbox.length > 0) {
      this.enqueue(event.from, outbox);
    }
  }

  /** Resolves when every queued delivery has been attempted. */
  async settled(): Promise<void> {
    while (this.deliveries.size > 0) {
      await Promise.all(this.deliveries.values());
    }
  }

  async onApplicationShutdown() {
    await this.settled();
  }

  private enqueue(to: string, outbox: RenderedMessage[]): void {
    const previous = this.deliveries.get(to) ?? Promise.resolve();
    const tail = previous.then(() => this.flush(to, outbox));
    this.deliveries.set(to, tail);
    void tail.finally(() => {
      if (this.deliveries.get(to) === tail) {
        this.deliveries.delete(to);
      }
    });
  }

  private async flush(to: string, outbox: RenderedMessage[]): Promise<void> {
    for (const message of outbox) {
      await this.deliver(to, message);
    }
  }

  private transition(session: Session, event: UserEvent): RenderedMessage[] {
    switch (session.state) {
      case 'NEW':
        session.state = 'AWAITING_START';
        return [renderGreeting()];

      case 'AWAITING_START':
        if (event.kind === 'reply' && event.replyId === START_QUIZ_ID) {
          return this.start(session);
        }
        return [renderGreeting()];

      case 'IN_PROGRESS':
        if (event.kind !== 'reply') return [];
        if (event.replyId === START_QUIZ_ID) return this.start(session);
        return this.answer(session, event.replyId);

      case 'COMPLETED':
        return [];
    }
  }

  private start(session: Session): RenderedMessage[] {
    const total = this.bank.count();
    if (total === 0) {
      this.logger.warn(`⚠️ ${session.userId} tried to start, but no questions are loaded`);
      session.state = 'AWAITING_START';
      return [renderNoContent()];
    }

    session.state = 'IN_PROGRESS';
    session.questionIndex = 0;
    session.score = 0;
    this.logger.log(`📌 Quiz started for ${session.userId}`);
    return [renderQuestion(this.bank.get(0), total)];
  }

  private answer(session: Session, replyId: string): RenderedMessage[] {
    const total = this.bank.count();
    const question = this.bank.get(session.questionIndex);
    if (!isOptionId(question, replyId)) {
      this.logger.warn(`⚠️ Reply "${replyId}" from ${session.userId} matches no option of question ${question.index + 1}`);
      return [];
    }

    const correctId = String(question.correctOption);
    const outbox: RenderedMessage[] = [];

    if (replyId === correctId) {
      session.score += 1;
      outbox.push(renderCorrect(explanationFor(question, question.correctOption)));
    } else {
      const correctText = question.options.get(question.correctOption) ?? correctId;
      outbox.push(renderIncorrect(correctText, explanationFor(question, question.correctOption)));
    }

    session.questionIndex += 1;
    if (session.questionIndex < total) {
      outbox.push(renderQuestion(this.bank.get(session.questionIndex), total));
    } else {
      session.state = 'COMPLETED';
      this.logger.log(`🏁 ${session.userId} finished with ${session.score}/${total}`);
      outbox.push(renderCompletion(session.score, total));
    }
    return outbox;
  }

  private async deliver(to: string, message: RenderedMessage): Promise<void> {
    try {
      await sendRendered(this.messenger, to, message);
    } catch (error) {
      this.logger.error(`❌ Failed to send ${message.kind} message to ${to}: ${describeError(error)}`);
    }
  }
}

function isOptionId(question: Question, replyId: string): boolean {
  return [...question.options.keys()].some((number) => String(number) === replyId);
}

function explanationFor(question: Question, option: number): string {
  return question.explanations.get(option) ?? NO_EXPLANATION;
}
