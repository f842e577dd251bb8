// Demand-driven interest registry: tracks which parameters the UI currently needs

import { randomUUID } from 'crypto';
import { ParameterId, describeParameterSet, normalizeParameterId } from '../../models/Parameter';
import { logger, LogCategory } from '../../utils/Logger';
import { TaskQueue } from './TaskQueue';

export type InterestToken = string;

export type InterestListener = (interested: ReadonlySet<ParameterId>) => void;

export function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

function toParameterSet(parameters: Iterable<ParameterId>): Set<ParameterId> {
  const result = new Set<ParameterId>();
  for (const id of parameters) {
    result.add(normalizeParameterId(id));
  }
  return result;
}

export class InterestRegistry {
  private readonly byToken = new Map<InterestToken, ReadonlySet<ParameterId>>();
  private interested: ReadonlySet<ParameterId> = new Set();
  private readonly listeners = new Set<InterestListener>();

  constructor(private readonly queue: TaskQueue) {}

  makeToken(): InterestToken {
    return randomUUID();
  }

  /** Current union of every live token's parameters. */
  getInterested(): ReadonlySet<ParameterId> {
    return this.interested;
  }

  getParameters(token: InterestToken): ReadonlySet<ParameterId> | undefined {
    return this.byToken.get(token);
  }

  get tokenCount(): number {
    return this.byToken.size;
  }

  replace(parameters: Iterable<ParameterId>, token: InterestToken): void {
    this.byToken.set(token, toParameterSet(parameters));
    this.recompute();
  }

  add(parameters: Iterable<ParameterId>, token: InterestToken): void {
    const current = new Set(this.byToken.get(token) ?? []);
    for (const id of toParameterSet(parameters)) {
      current.add(id);
    }
    this.byToken.set(token, current);
    this.recompute();
  }

  remove(parameters: Iterable<ParameterId>, token: InterestToken): void {
    const existing = this.byToken.get(token);
    if (!existing) return;

    const current = new Set(existing);
    for (const id of toParameterSet(parameters)) {
      current.delete(id);
    }
    if (current.size === 0) {
      this.byToken.delete(token);
    } else {
      this.byToken.set(token, current);
    }
    this.recompute();
  }

  /**
   * Drops the token's interest on the next turn of the task queue. Callers are
   * often teardown paths running inside another registry mutation.
   */
  clear(token: InterestToken): void {
    this.queue.enqueue(() => {
      if (!this.byToken.delete(token)) {
        logger.debug(LogCategory.INTEREST, 'Clear ignored for unknown token', { token });
        return;
      }
      this.recompute();
    });
  }

  subscribe(listener: InterestListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private recompute(): void {
    const union = new Set<ParameterId>();
    for (const parameters of this.byToken.values()) {
      for (const id of parameters) {
        union.add(id);
      }
    }

    if (setsEqual(union, this.interested)) {
      return;
    }

    logger.info(LogCategory.INTEREST, `Interested set changed to {${describeParameterSet(union)}}`);
    this.interested = union;

    for (const listener of [...this.listeners]) {
      try {
        listener(union);
      } catch (error) {
        logger.error(LogCategory.INTEREST, 'Interest listener failed', error);
      }
    }
  }
}
