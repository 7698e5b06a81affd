/**
 * Processors are stages of the chain between the traversal and the caller.
 * Each one pulls steps from its upstream source, may act on them or keep
 * them for itself, and is in turn the step source of the next stage.
 */
import { consoleLogger } from '@glyphscrape/types';
import type { LayoutNode, Logger, NodeKind } from '@glyphscrape/types';
import { formatState } from './traversal.js';
import type { Reply, Step, StepResult, StepSource } from './traversal.js';

export type Processor<S, D> = (upstream: StepSource<S>, data: D) => StepSource<S>;

export type StepOutcome<S> =
  | { readonly kind: 'forward'; readonly step: Step<S> }
  | { readonly kind: 'consume'; readonly reply: Reply<S> };

export abstract class StepProcessor<S, D> implements StepSource<S> {
  private started = false;
  private pending: Step<S> | null = null;
  private result: StepResult<S> | null = null;

  constructor(
    protected readonly upstream: StepSource<S>,
    protected readonly data: D
  ) {}

  next(reply: Reply<S> = {}): StepResult<S> {
    if (this.result !== null) return this.result;

    let upstreamResult: StepResult<S>;
    if (!this.started) {
      this.started = true;
      upstreamResult = this.upstream.next();
    } else {
      const pending = this.pending;
      upstreamResult = this.upstream.next(pending === null ? reply : this.onReply(pending, reply));
    }

    while (!upstreamResult.done) {
      const outcome = this.onStep(upstreamResult.step);
      if (outcome.kind === 'forward') {
        this.pending = outcome.step;
        return { done: false, step: outcome.step };
      }
      upstreamResult = this.upstream.next(outcome.reply);
    }

    this.pending = null;
    this.result = upstreamResult;
    return upstreamResult;
  }

  /** Forward the step downstream or consume it, replying upstream directly. */
  protected abstract onStep(step: Step<S>): StepOutcome<S>;

  /** Turn the downstream reply to a forwarded step into the upstream reply. */
  protected onReply(_step: Step<S>, reply: Reply<S>): Reply<S> {
    return reply;
  }
}

export interface Decision<S> {
  /** The node was taken care of: don't forward it nor recurse into it */
  handled: boolean;
  /** New state, absent to keep the current one */
  state?: S;
}

export type DecisionFn<S, D> = (step: Step<S>, data: D) => Decision<S>;

class DecisionProcessor<S, D> extends StepProcessor<S, D> {
  constructor(
    upstream: StepSource<S>,
    data: D,
    private readonly decide: DecisionFn<S, D>
  ) {
    super(upstream, data);
  }

  protected onStep(step: Step<S>): StepOutcome<S> {
    const decision = this.decide(step, this.data);
    if (decision.handled) {
      return { kind: 'consume', reply: { recurse: false, state: decision.state ?? step.state } };
    }
    if (decision.state === undefined) {
      return { kind: 'forward', step };
    }
    const forwarded: Step<S> =
      step.node === null ? { state: decision.state, node: null } : { state: decision.state, node: step.node };
    return { kind: 'forward', step: forwarded };
  }
}

/**
 * Turn a function deciding on a single step into a processor.
 */
export function simpleProcessor<S, D>(decide: DecisionFn<S, D>): Processor<S, D> {
  return (upstream, data) => new DecisionProcessor(upstream, data, decide);
}

/**
 * Processor blocking propagation and recursion of nodes of the given kinds.
 */
export function skipKindsProcessor<S, D>(kinds: Iterable<NodeKind>): Processor<S, D> {
  const skipped = new Set(kinds);
  return simpleProcessor<S, D>((step) => ({
    handled: step.node !== null && skipped.has(step.node.kind),
  }));
}

const RECURSIVE_KINDS: ReadonlySet<NodeKind> = new Set<NodeKind>(['text-box', 'text-line']);

function isTextContainer(node: LayoutNode | null): boolean {
  return node !== null && RECURSIVE_KINDS.has(node.kind);
}

class BaseRecursionProcessor<S, D> extends StepProcessor<S, D> {
  protected onStep(step: Step<S>): StepOutcome<S> {
    return { kind: 'forward', step };
  }

  protected override onReply(step: Step<S>, reply: Reply<S>): Reply<S> {
    if (reply.recurse === false) return reply;
    return { ...reply, recurse: isTextContainer(step.node) };
  }
}

/**
 * Allow recursion into text boxes and text lines only, unless a downstream
 * processor says otherwise. Usually the first processor of the chain.
 */
export function baseRecursionProcessor<S, D>(upstream: StepSource<S>, data: D): StepSource<S> {
  return new BaseRecursionProcessor(upstream, data);
}

class DebugProcessor<S, D> extends StepProcessor<S, D> {
  constructor(
    upstream: StepSource<S>,
    data: D,
    private readonly logger: Logger
  ) {
    super(upstream, data);
  }

  protected onStep(step: Step<S>): StepOutcome<S> {
    const text = step.node === null ? 'null' : JSON.stringify(step.node.lowerText);
    this.logger.info(`[${formatState(step.state)}] ${text}`);
    return { kind: 'forward', step };
  }
}

/**
 * Log every step going through this point of the chain.
 */
export function debugProcessor<S, D>(logger: Logger = consoleLogger): Processor<S, D> {
  return (upstream, data) => new DebugProcessor(upstream, data, logger);
}

/** Kinds blocked by the base chain: only text containers reach later stages. */
export const BASE_SKIP_KINDS: readonly NodeKind[] = ['char', 'curve', 'figure', 'image', 'line', 'rect'];

/**
 * The processors you usually want first: recursion limited to text
 * containers, characters and graphics filtered out.
 */
export function baseProcessors<S, D>(): Array<Processor<S, D>> {
  return [baseRecursionProcessor, skipKindsProcessor<S, D>(BASE_SKIP_KINDS)];
}

export function buildChain<S, D>(source: StepSource<S>, processors: ReadonlyArray<Processor<S, D>>, data: D): StepSource<S> {
  return processors.reduce<StepSource<S>>((upstream, processor) => processor(upstream, data), source);
}
