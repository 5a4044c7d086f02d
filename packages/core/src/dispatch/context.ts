/**
 * Handler Stack
 *
 * An explicit, caller-owned stack of handlers. Events are offered to the
 * most recently installed handler first and then outward. Nothing here is
 * process-wide: two contexts never see each other's handlers.
 */

import type { FxEvent } from '@fxlog/shared';
import { createLogger } from '../utils/logger.js';
import { applyFallback } from './fallback.js';
import type { EventHandler, HandlerResult } from './handler.js';

const log = createLogger('dispatch:context');

export interface DispatchResult {
  /** True when a handler consumed the event or forwarded it as handled */
  handled: boolean;
  /** The event as it left the outermost handler */
  event: FxEvent;
}

export class EffectContext {
  private readonly stack: EventHandler[] = [];

  /**
   * Push a handler. The returned function removes exactly this handler,
   * wherever it sits in the stack by then. Calling it twice is a no-op.
   */
  install(handler: EventHandler): () => void {
    this.stack.push(handler);
    log.debug({ handler: handler.name, depth: this.stack.length }, 'Handler installed');

    let installed = true;
    return () => {
      if (!installed) {
        return;
      }
      installed = false;
      const index = this.stack.lastIndexOf(handler);
      if (index !== -1) {
        this.stack.splice(index, 1);
      }
      log.debug({ handler: handler.name, depth: this.stack.length }, 'Handler removed');
    };
  }

  /**
   * Number of installed handlers
   */
  get size(): number {
    return this.stack.length;
  }

  /**
   * Handler names, innermost first
   */
  handlerNames(): string[] {
    return this.stack.map(handler => handler.name).reverse();
  }

  /**
   * Offer an event to the stack without applying the fallback policy.
   */
  dispatch(event: FxEvent): DispatchResult {
    if (event.kind === 'log') {
      return this.offer(event, (handler, current) => handler.handleLog?.(current));
    }
    return this.offer(event, (handler, current) => handler.handleProgress?.(current));
  }

  /**
   * Offer an event to the stack; unhandled events go to the fallback policy
   * in the form the last handler passed them on.
   */
  send(event: FxEvent): void {
    const result = this.dispatch(event);
    if (!result.handled) {
      applyFallback(this, result.event);
    }
  }

  private offer<E extends FxEvent>(
    event: E,
    invoke: (handler: EventHandler, event: E) => HandlerResult<E> | undefined
  ): DispatchResult {
    // Snapshot: handlers installed or removed while dispatching take effect next time
    const handlers = [...this.stack].reverse();
    let current = event;
    let handled = false;

    for (const handler of handlers) {
      const result = invoke(handler, current);
      if (result === undefined || result.action === 'ignore') {
        continue;
      }
      if (result.action === 'consume') {
        return { handled: true, event: current };
      }
      handled ||= result.handled;
      current = result.event;
    }

    return { handled, event: current };
  }
}

/**
 * Create an empty handler stack
 */
export function createContext(): EffectContext {
  return new EffectContext();
}
