import type { Logger } from '@metaeval/types'
import { describeError } from '../utils/logger'
import type { EvaluationEvents, EventData, EventHandler, EventSubscription } from './types'

/**
 * Handler wrapper for internal use
 */
interface HandlerWrapper<T extends EventData> {
  readonly id: number
  readonly handler: EventHandler<T>
  readonly priority: number
}

type HandlerTable<M> = { [K in keyof M]?: HandlerWrapper<Extract<M[K], EventData>>[] }

/**
 * In-process pub-sub bus, typed by an event map.
 * A throwing or rejecting handler is logged and never reaches the emitter.
 */
export class EventBus<M extends { [K in keyof M]: EventData } = EvaluationEvents> {
  private readonly handlers: HandlerTable<M> = {}
  private subscriptionId = 0
  private readonly pendingAsyncHandlers = new Set<Promise<void>>()

  constructor(private readonly logger?: Logger) {}

  /**
   * Subscribe to an event. Higher priority handlers run first.
   */
  subscribe<K extends keyof M & string>(
    eventType: K,
    handler: EventHandler<Extract<M[K], EventData>>,
    options: { priority?: number } = {},
  ): EventSubscription {
    const { priority = 0 } = options
    let handlers: HandlerWrapper<Extract<M[K], EventData>>[] | undefined = this.handlers[eventType]
    if (!handlers) {
      handlers = []
      this.handlers[eventType] = handlers
    }

    const id = ++this.subscriptionId
    const wrapper: HandlerWrapper<Extract<M[K], EventData>> = { id, handler, priority }

    // Insert handler in priority order (higher priority first)
    const insertIndex = handlers.findIndex(h => h.priority < priority)
    if (insertIndex === -1) {
      handlers.push(wrapper)
    } else {
      handlers.splice(insertIndex, 0, wrapper)
    }

    return {
      id,
      eventType,
      unsubscribe: () => {
        const index = handlers.findIndex(h => h.id === id)
        if (index !== -1) {
          handlers.splice(index, 1)
        }
      },
    }
  }

  /**
   * Emit an event to all subscribers
   */
  emit<K extends keyof M & string>(eventType: K, data: Extract<M[K], EventData>): void {
    const handlers = this.handlers[eventType]
    if (!handlers || handlers.length === 0) {
      return
    }

    for (const wrapper of [...handlers]) {
      try {
        const result = wrapper.handler(data)
        if (result instanceof Promise) {
          const pending = result.then(
            () => undefined,
            (error: unknown) => this.handleError(error, eventType),
          )
          this.pendingAsyncHandlers.add(pending)
          void pending.finally(() => this.pendingAsyncHandlers.delete(pending))
        }
      } catch (error) {
        this.handleError(error, eventType)
      }
    }
  }

  private handleError(error: unknown, eventType: string): void {
    this.logger?.error('Event handler failed', { eventType, error: describeError(error) })
  }

  /**
   * Wait for all pending async handlers to complete
   */
  async waitForAsyncHandlers(): Promise<void> {
    await Promise.all(Array.from(this.pendingAsyncHandlers))
  }

  /**
   * Get handler count for an event type
   */
  getHandlerCount(eventType: keyof M & string): number {
    return this.handlers[eventType]?.length ?? 0
  }

  /**
   * Remove all handlers for an event type, or every handler
   */
  removeAllHandlers(eventType?: keyof M & string): void {
    if (eventType) {
      delete this.handlers[eventType]
    } else {
      for (const key of Object.keys(this.handlers)) {
        Reflect.deleteProperty(this.handlers, key)
      }
    }
  }
}
