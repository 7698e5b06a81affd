/**
 * Depth-first traversal of a node tree driven by its consumer.
 *
 *   traverse --[state, node]--> processor 1 --[state, node]--> processor 2
 *            <--[recurse, state]--          <--[recurse, state]--
 *
 * Each step hands out the current state and node; the consumer's reply to it,
 * passed to the following `next()` call, tells whether to descend into the
 * node and which state to carry on with.
 */
import { consoleLogger, isContainer } from '@glyphscrape/types';
import type { LayoutNode, Logger } from '@glyphscrape/types';

/** State of the synthetic last step of a page, associated with no node. */
export const END_OF_PAGE: unique symbol = Symbol('end-of-page');
export type EndOfPage = typeof END_OF_PAGE;

export type StepState<S> = S | EndOfPage;

export interface NodeStep<S> {
  readonly state: S;
  readonly node: LayoutNode;
}

export interface EndOfPageStep<S> {
  readonly state: StepState<S>;
  readonly node: null;
}

export type Step<S> = NodeStep<S> | EndOfPageStep<S>;

export interface Reply<S> {
  /** Descend into the node's children; absent means yes */
  readonly recurse?: boolean;
  /** State to carry on with; absent keeps the current one */
  readonly state?: StepState<S>;
}

export type StepResult<S> =
  | { readonly done: false; readonly step: Step<S> }
  | { readonly done: true; readonly state: S };

/**
 * Anything handing out steps: the traversal itself or a processor.
 * The first call takes no reply; every later call carries the reply to the
 * step returned by the previous one.
 */
export interface StepSource<S> {
  next(reply?: Reply<S>): StepResult<S>;
}

export function isEndOfPage<S>(state: StepState<S> | undefined): state is EndOfPage {
  return state === END_OF_PAGE;
}

export function formatState<S>(state: StepState<S>): string {
  if (isEndOfPage(state)) return 'end of page';
  return typeof state === 'string' ? state : JSON.stringify(state) ?? String(state);
}

type Phase = 'idle' | 'node' | 'end-of-page' | 'done';

class Traversal<S> implements StepSource<S> {
  private readonly stack: LayoutNode[];
  private phase: Phase = 'idle';
  private current: LayoutNode | null = null;

  constructor(
    root: LayoutNode,
    private state: S,
    private readonly logger: Logger
  ) {
    this.stack = isContainer(root) ? [...root.children].reverse() : [];
  }

  next(reply: Reply<S> = {}): StepResult<S> {
    switch (this.phase) {
      case 'idle':
        return this.advance();
      case 'node':
        this.acknowledge(reply);
        return this.advance();
      case 'end-of-page':
        this.phase = 'done';
        // nobody reacted to the end of page: keep the state it was announced with
        if (reply.state !== undefined && !isEndOfPage(reply.state)) {
          this.state = reply.state;
        }
        return { done: true, state: this.state };
      case 'done':
        return { done: true, state: this.state };
    }
  }

  private acknowledge(reply: Reply<S>): void {
    const node = this.current;
    if (node !== null && reply.recurse !== false && isContainer(node)) {
      for (let i = node.children.length - 1; i >= 0; i--) {
        const child = node.children[i];
        if (child !== undefined) this.stack.push(child);
      }
    }

    const newState = reply.state;
    if (newState !== undefined && !isEndOfPage(newState) && newState !== this.state) {
      this.logger.debug(`State change from ${formatState(this.state)} to ${formatState(newState)}`);
      this.state = newState;
    }
  }

  private advance(): StepResult<S> {
    const node = this.stack.pop();
    if (node === undefined) {
      this.current = null;
      this.phase = 'end-of-page';
      return { done: false, step: { state: END_OF_PAGE, node: null } };
    }
    this.current = node;
    this.phase = 'node';
    return { done: false, step: { state: this.state, node } };
  }
}

/**
 * Start a traversal of `root`'s descendants in pre-order, `root` itself
 * excluded.
 */
export function traverse<S>(root: LayoutNode, initialState: S, logger: Logger = consoleLogger): StepSource<S> {
  return new Traversal(root, initialState, logger);
}
