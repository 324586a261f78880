/**
 * Cooperative cancellation shared by every unit of work of one run
 *
 * The flag goes from false to true at most once and is never cleared.
 */
export class CancellationContext {
  private readonly controller = new AbortController()

  get cancelled(): boolean {
    return this.controller.signal.aborted
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  /**
   * Set the flag
   *
   * @returns true if this call cancelled the context, false if it already was
   */
  cancel(reason = 'cancelled'): boolean {
    if (this.cancelled) {
      return false
    }
    this.controller.abort(reason)
    return true
  }

  /**
   * Call `listener` once on cancellation, immediately if already cancelled
   *
   * @returns a function that removes the listener
   */
  onCancel(listener: () => void): () => void {
    if (this.cancelled) {
      listener()
      return () => {}
    }
    const signal = this.controller.signal
    signal.addEventListener('abort', listener, { once: true })
    return () => signal.removeEventListener('abort', listener)
  }
}

/**
 * Cancel `context` when the process receives `signal`
 *
 * @returns a function that removes the handler
 */
export function cancelOnSignal(
  context: CancellationContext,
  signal: NodeJS.Signals = 'SIGINT',
  onSignal?: () => void
): () => void {
  const handler = () => {
    if (context.cancel(signal)) {
      onSignal?.()
    }
  }
  process.once(signal, handler)
  return () => {
    process.removeListener(signal, handler)
  }
}
