import { DuplicateCallError } from '../errors';
import { log } from '../log';
import { setActiveCalls } from '../metrics';
import type { CallId, CallRecord, TerminationReason } from './types';
import type { VoiceBridge } from './voiceBridge';

/**
 * Process-wide index of live calls. Reads are synchronous; writers for one
 * call id run one at a time through `withKey`, independent of other ids.
 */
export class CallRegistry {
  private readonly calls = new Map<CallId, VoiceBridge>();
  private readonly locks = new Map<CallId, Promise<void>>();

  public get size(): number {
    return this.calls.size;
  }

  public lookup(callId: CallId): VoiceBridge | undefined {
    return this.calls.get(callId);
  }

  public list(): CallRecord[] {
    return Array.from(this.calls.values(), (bridge) => bridge.snapshot());
  }

  /** Throws DuplicateCallError when the id is already live. */
  public register(bridge: VoiceBridge): void {
    if (this.calls.has(bridge.callId)) {
      throw new DuplicateCallError(bridge.callId);
    }
    this.calls.set(bridge.callId, bridge);
    setActiveCalls(this.calls.size);
    log.info({ event: 'call_registered', call_id: bridge.callId, active: this.calls.size }, 'call registered');
  }

  /** Removes the entry only if it still belongs to `bridge` when one is given. */
  public deregister(callId: CallId, bridge?: VoiceBridge): boolean {
    const current = this.calls.get(callId);
    if (!current || (bridge && current !== bridge)) {
      return false;
    }
    this.calls.delete(callId);
    setActiveCalls(this.calls.size);
    log.info({ event: 'call_deregistered', call_id: callId, active: this.calls.size }, 'call deregistered');
    return true;
  }

  public withKey<T>(callId: CallId, task: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(callId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(callId, tail);
    void tail.then(() => {
      if (this.locks.get(callId) === tail) {
        this.locks.delete(callId);
      }
    });
    return run;
  }

  public async closeAll(reason: TerminationReason = 'Shutdown'): Promise<CallRecord[]> {
    const bridges = Array.from(this.calls.values());
    if (bridges.length > 0) {
      log.info({ event: 'calls_closing', count: bridges.length, reason }, 'terminating live calls');
    }
    const records = await Promise.all(bridges.map((bridge) => bridge.terminate(reason)));
    for (const bridge of bridges) {
      this.deregister(bridge.callId, bridge);
    }
    return records;
  }
}
