import type { Logger } from '@metaeval/types'
import type { CycleName } from '../events/types'

export interface PeriodicCycleOptions {
  readonly name: CycleName
  /** Sleep after a successful iteration */
  readonly intervalMs: number
  /** Sleep after a failed iteration */
  readonly errorDelayMs: number
  readonly run: () => Promise<void>
  readonly onError: (error: unknown) => void
  readonly logger: Logger
}

/**
 * Resolves after `ms`, or as soon as the signal aborts
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve()
      return
    }

    const done = (): void => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}

/**
 * A background loop running one iteration, then sleeping, until stopped.
 * Failed iterations are reported through `onError` and the loop carries on.
 */
export class PeriodicCycle {
  private controller: AbortController | null = null
  private loop: Promise<void> | null = null

  constructor(private readonly options: PeriodicCycleOptions) {}

  get name(): CycleName {
    return this.options.name
  }

  get isRunning(): boolean {
    return this.controller !== null
  }

  start(): void {
    if (this.controller) {
      this.options.logger.warn('Cycle already running', { cycle: this.options.name })
      return
    }

    const controller = new AbortController()
    this.controller = controller
    this.loop = this.runLoop(controller.signal)
  }

  /**
   * Resolves once the current iteration, if any, has finished
   */
  async stop(): Promise<void> {
    const { controller, loop } = this
    this.controller = null
    this.loop = null

    controller?.abort()
    await loop
  }

  /**
   * Run a single iteration
   * @returns False when the iteration failed
   */
  async runOnce(): Promise<boolean> {
    try {
      await this.options.run()
      return true
    } catch (error) {
      this.options.onError(error)
      return false
    }
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    this.options.logger.debug('Cycle started', { cycle: this.options.name })

    while (!signal.aborted) {
      const succeeded = await this.runOnce()
      await abortableSleep(succeeded ? this.options.intervalMs : this.options.errorDelayMs, signal)
    }

    this.options.logger.debug('Cycle stopped', { cycle: this.options.name })
  }
}
