import { isSlotAnswered, type Criteria, type SlotKey } from "./criteria.js";
import type { Question } from "./lookups.js";

export type SlotQuestion = { key: SlotKey; text: string };

function isSlotQuestion(question: Question): question is Question & { key: SlotKey } {
  return question.key !== "name";
}

/** Configured order of the required slots; the name question is collected separately. */
export class QuestionFlow {
  private readonly slots: SlotQuestion[];

  constructor(questions: readonly Question[]) {
    this.slots = questions.filter(isSlotQuestion).map(({ key, text }) => ({ key, text }));
  }

  getMissing(criteria: Criteria): SlotKey[] {
    return this.slots.filter((q) => !isSlotAnswered(criteria, q.key)).map((q) => q.key);
  }

  /** Next missing slot not yet in `asked`, or undefined once every missing slot was asked. */
  getNext(criteria: Criteria, asked: Iterable<SlotKey>): SlotQuestion | undefined {
    const skip = new Set(asked);
    return this.slots.find((q) => !skip.has(q.key) && !isSlotAnswered(criteria, q.key));
  }

  questionFor(slot: SlotKey): SlotQuestion | undefined {
    return this.slots.find((q) => q.key === slot);
  }

  isComplete(criteria: Criteria): boolean {
    return this.getMissing(criteria).length === 0;
  }
}
