/**
 * Deadline helper for agent calls.
 *
 * @module
 */

import { AgentFailureError, AgentTimeoutError } from './errors.js';

/**
 * Abort `controller` when `parent` aborts. Returns the unlink function.
 */
export function linkAbortSignal(
  parent: AbortSignal | undefined,
  controller: AbortController,
): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    controller.abort(parent.reason);
    return () => {};
  }
  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

/**
 * Run `fn` with its own AbortController and a hard deadline.
 *
 * On expiry the controller is aborted with an {@link AgentTimeoutError} and
 * the returned promise rejects with it, whether or not `fn` honors the
 * signal. Aborting `parentSignal` rejects with an {@link AgentFailureError}.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  deadlineMs: number,
  agentName: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const unlink = linkAbortSignal(parentSignal, controller);
  let timer: ReturnType<typeof setTimeout> | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    const timeoutMs = Math.max(0, Math.floor(deadlineMs));
    timer = setTimeout(() => {
      const error = new AgentTimeoutError(agentName, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
    controller.signal.addEventListener(
      'abort',
      () => {
        if (!(controller.signal.reason instanceof AgentTimeoutError)) {
          reject(new AgentFailureError(agentName, 'cancelled', controller.signal.reason));
        }
      },
      { once: true },
    );
  });
  // The race below observes rejections; this keeps a lost race from surfacing as unhandled.
  interrupted.catch(() => undefined);

  try {
    if (controller.signal.aborted) {
      throw new AgentFailureError(agentName, 'cancelled', controller.signal.reason);
    }
    return await Promise.race([fn(controller.signal), interrupted]);
  } catch (error) {
    // An operation that rejects in reaction to the abort reports the abort cause instead.
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof AgentTimeoutError || error instanceof AgentFailureError) {
        throw reason instanceof AgentTimeoutError ? reason : error;
      }
      throw new AgentFailureError(agentName, 'cancelled', reason);
    }
    throw error;
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    unlink();
  }
}
