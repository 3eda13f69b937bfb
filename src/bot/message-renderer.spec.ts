import { Question } from '../quiz/question';
import {
  renderCompletion,
  renderGreeting,
  renderIncorrect,
  renderQuestion,
  START_QUIZ_ID,
  truncateTitle,
} from './message-renderer';

function question(options: string[], index = 0): Question {
  return {
    index,
    text: 'Pick one',
    options: new Map(options.map((text, i): [number, string] => [i + 1, text])),
    correctOption: 1,
    explanations: new Map(),
  };
}

describe('renderQuestion', () => {
  it('renders two options as buttons', () => {
    expect(renderQuestion(question(['Yes', 'No']), 5)).toEqual({
      kind: 'buttons',
      body: 'Question 1/5: Pick one',
      buttons: [
        { id: '1', title: 'Yes' },
        { id: '2', title: 'No' },
      ],
    });
  });

  it('renders exactly three options as buttons', () => {
    const rendered = renderQuestion(question(['A', 'B', 'C'], 2), 3);
    expect(rendered.kind).toBe('buttons');
    expect(rendered.body).toBe('Question 3/3: Pick one');
  });

  it('renders four options as a single-select list', () => {
    expect(renderQuestion(question(['A', 'B', 'C', 'D']), 1)).toEqual({
      kind: 'list',
      body: 'Question 1/1: Pick one',
      buttonLabel: 'Choose option',
      sectionTitle: 'Select answer',
      rows: [
        { id: '1', title: 'A' },
        { id: '2', title: 'B' },
        { id: '3', title: 'C' },
        { id: '4', title: 'D' },
      ],
    });
  });

  it('keeps the option number as id when slots are missing', () => {
    const sparse: Question = { ...question([]), options: new Map([[2, 'Second'], [4, 'Fourth']]) };
    const rendered = renderQuestion(sparse, 1);
    expect(rendered).toEqual({
      kind: 'buttons',
      body: 'Question 1/1: Pick one',
      buttons: [
        { id: '2', title: 'Second' },
        { id: '4', title: 'Fourth' },
      ],
    });
  });

  it('truncates long option titles to 20 characters', () => {
    const rendered = renderQuestion(question(['An answer that is far too long for a button']), 1);
    expect(rendered).toMatchObject({ buttons: [{ id: '1', title: 'An answer that is fa' }] });
  });
});

describe('truncateTitle', () => {
  it('counts code points rather than UTF-16 units', () => {
    expect(truncateTitle('😀'.repeat(25))).toBe('😀'.repeat(20));
  });

  it('leaves short titles alone', () => {
    expect(truncateTitle('Short')).toBe('Short');
  });
});

describe('fixed messages', () => {
  it('offers a single start button in the greeting', () => {
    const greeting = renderGreeting();
    expect(greeting).toMatchObject({ kind: 'buttons', buttons: [{ id: START_QUIZ_ID, title: 'Start ✅' }] });
  });

  it('formats the completion tally', () => {
    expect(renderCompletion(3, 4)).toEqual({ kind: 'text', body: '🎉 Quiz complete!\nYour score: 3/4' });
  });

  it('names the correct answer and reason when wrong', () => {
    expect(renderIncorrect('Paris', 'Capital of France.')).toEqual({
      kind: 'text',
      body: '❌ Wrong answer.\n👉 Correct answer: Paris\nℹ️ Reason: Capital of France.',
    });
  });
});
