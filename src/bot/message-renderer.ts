import { Question } from '../quiz/question';
import { RenderedMessage, ReplyOption } from './messenger';

export const START_QUIZ_ID = 'start_quiz';
/** Reply buttons hold at most three choices; more go into a list. */
export const MAX_BUTTONS = 3;
export const TITLE_WIDTH = 20;

export const LIST_BUTTON_LABEL = 'Choose option';
export const LIST_SECTION_TITLE = 'Select answer';

export function truncateTitle(title: string): string {
  return Array.from(title).slice(0, TITLE_WIDTH).join('');
}

export function renderGreeting(): RenderedMessage {
  return {
    kind: 'buttons',
    body: '👋 Hello! Welcome to the quiz bot 🙏\nWould you like to start the quiz?',
    buttons: [{ id: START_QUIZ_ID, title: 'Start ✅' }],
  };
}

export function renderQuestion(question: Question, total: number): RenderedMessage {
  const body = `Question ${question.index + 1}/${total}: ${question.text}`;
  const choices: ReplyOption[] = [...question.options].map(([number, text]) => ({
    id: String(number),
    title: truncateTitle(text),
  }));

  if (choices.length <= MAX_BUTTONS) {
    return { kind: 'buttons', body, buttons: choices };
  }
  return {
    kind: 'list',
    body,
    buttonLabel: LIST_BUTTON_LABEL,
    sectionTitle: LIST_SECTION_TITLE,
    rows: choices,
  };
}

export function renderCorrect(explanation: string): RenderedMessage {
  return { kind: 'text', body: `✅ Correct answer!\n${explanation}` };
}

export function renderIncorrect(correctText: string, explanation: string): RenderedMessage {
  return {
    kind: 'text',
    body: `❌ Wrong answer.\n👉 Correct answer: ${correctText}\nℹ️ Reason: ${explanation}`,
  };
}

export function renderCompletion(score: number, total: number): RenderedMessage {
  return { kind: 'text', body: `🎉 Quiz complete!\nYour score: ${score}/${total}` };
}

export function renderNoContent(): RenderedMessage {
  return { kind: 'text', body: '⚠️ No questions are available right now. Please try again later.' };
}
