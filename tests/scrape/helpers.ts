import { anno, textLine } from '@glyphscrape/types';
import type { ContainerNode, LayoutNode } from '@glyphscrape/types';
import type { Reply, Step, StepResult, StepSource } from '@glyphscrape/scrape';
import { charAt } from '../layout/helpers.js';

const CHAR_WIDTH = 4;

/**
 * Text line made of words starting at the given x positions, every
 * character being CHAR_WIDTH wide. Spaces become word-break annotations.
 */
export function tableLine(y0: number, segments: ReadonlyArray<[text: string, x0: number]>): ContainerNode {
  const children: LayoutNode[] = [];
  let left = Number.POSITIVE_INFINITY;
  let right = Number.NEGATIVE_INFINITY;

  for (const [index, [text, start]] of segments.entries()) {
    if (index > 0) children.push(anno(' '));
    let x = start;
    for (const letter of text) {
      if (letter === ' ') {
        children.push(anno(' '));
      } else {
        children.push(charAt(letter, x, x + CHAR_WIDTH, y0));
      }
      x += CHAR_WIDTH;
    }
    left = Math.min(left, start);
    right = Math.max(right, x);
  }
  children.push(anno('\n'));

  return textLine({ x0: left, y0, x1: right, y1: y0 + 10 }, children);
}

/**
 * Step source replaying fixed steps and recording the replies it gets.
 */
export class ScriptedSource<S> implements StepSource<S> {
  readonly replies: Array<Reply<S>> = [];
  private index = 0;
  private started = false;

  constructor(
    private readonly steps: ReadonlyArray<Step<S>>,
    private readonly finalState: S
  ) {}

  next(reply: Reply<S> = {}): StepResult<S> {
    if (this.started) this.replies.push(reply);
    this.started = true;

    const step = this.steps[this.index];
    if (step === undefined) {
      return { done: true, state: this.finalState };
    }
    this.index++;
    return { done: false, step };
  }
}

/**
 * Pull every step out of `source`, answering each one with `respond`.
 */
export function drain<S>(
  source: StepSource<S>,
  respond: (step: Step<S>) => Reply<S> = () => ({})
): { steps: Array<Step<S>>; state: S } {
  const steps: Array<Step<S>> = [];
  let result = source.next();
  while (!result.done) {
    steps.push(result.step);
    result = source.next(respond(result.step));
  }
  return { steps, state: result.state };
}
