/**
 * Timeout utilities for platform calls
 *
 * A bridge call that never returns would otherwise hang the whole pipeline.
 */

/**
 * Wrap a promise with a timeout
 *
 * @param operation - Operation name for the error message
 * @param onTimeout - Called once when the timeout fires, to stop the work behind `promise`
 *
 * @example
 * ```ts
 * const result = await withTimeout(
 *   platform.stage(env, artifact, 'managed'),
 *   30000,
 *   'stage'
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      onTimeout?.()
      reject(new Error(`Operation timed out after ${timeoutMs}ms: ${operation}`))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
