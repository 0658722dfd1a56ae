/**
 * Project lock type definitions.
 *
 * One engine drives a project at a time. The lock file stores enough to tell
 * whether its holder is still alive, so a crashed run's lock can be reclaimed.
 */

/**
 * Information stored in the lock file.
 */
export interface LockInfo {
  /** Process ID that holds the lock */
  pid: number;
  /** ISO timestamp when lock was acquired */
  started_at: string;
  /** Unique identifier for the current boot session */
  boot_id: string;
}
