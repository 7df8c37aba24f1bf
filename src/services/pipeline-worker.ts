import { WorkerRole } from '@/types';

/**
 * A long-running per-lot task. `run` loops until `signal` aborts and must not
 * reject on transient failures; the supervisor treats any exit while the
 * signal is still live as a crash and relaunches the role.
 */
export interface PipelineWorker {
  readonly role: WorkerRole;
  run(signal: AbortSignal): Promise<void>;
  /** Completion time of the most recent loop iteration, used for stall detection. */
  lastActivityAt(): Date | null;
}
