import { describe, it, expect } from 'vitest';
import { withDeadline, linkAbortSignal } from './timeout.js';
import { AgentFailureError, AgentTimeoutError } from './errors.js';

function hangUntilAborted(observed: { signal?: AbortSignal }) {
  return (signal: AbortSignal) => {
    observed.signal = signal;
    return new Promise<string>((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  };
}

describe('withDeadline', () => {
  it('resolves with the operation result inside the deadline', async () => {
    await expect(withDeadline(async () => 'done', 1_000, 'scout')).resolves.toBe('done');
  });

  it('rejects with AgentTimeoutError and aborts the operation on expiry', async () => {
    const observed: { signal?: AbortSignal } = {};
    const error = await withDeadline(hangUntilAborted(observed), 20, 'vision').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentTimeoutError);
    expect(error).toMatchObject({ agentName: 'vision', timeoutMs: 20 });
    expect(observed.signal?.aborted).toBe(true);
  });

  it('stays bounded when the operation ignores its signal', async () => {
    const started = Date.now();
    const never = () => new Promise<string>(() => {});
    await expect(withDeadline(never, 20, 'graph')).rejects.toBeInstanceOf(AgentTimeoutError);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('propagates operation errors unchanged', async () => {
    await expect(
      withDeadline(() => Promise.reject(new Error('dns lookup failed')), 1_000, 'graph'),
    ).rejects.toThrow('dns lookup failed');
  });

  it('rejects with AgentFailureError when the parent signal aborts', async () => {
    const parent = new AbortController();
    const observed: { signal?: AbortSignal } = {};
    const pending = withDeadline(hangUntilAborted(observed), 5_000, 'scout', parent.signal);
    parent.abort(new Error('audit cancelled'));

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AgentFailureError);
    expect(observed.signal?.aborted).toBe(true);
  });

  it('does not start work under an already aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;
    await expect(
      withDeadline(async () => { started = true; return 1; }, 1_000, 'judge', parent.signal),
    ).rejects.toBeInstanceOf(AgentFailureError);
    expect(started).toBe(false);
  });
});

describe('linkAbortSignal', () => {
  it('forwards the parent reason and can be unlinked', () => {
    const parent = new AbortController();
    const child = new AbortController();
    const unlink = linkAbortSignal(parent.signal, child);
    unlink();
    parent.abort('stop');
    expect(child.signal.aborted).toBe(false);

    const linkedParent = new AbortController();
    const linkedChild = new AbortController();
    linkAbortSignal(linkedParent.signal, linkedChild);
    linkedParent.abort('stop');
    expect(linkedChild.signal.reason).toBe('stop');
  });
});
