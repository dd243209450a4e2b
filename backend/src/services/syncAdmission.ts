import logger from '../utils/logger';

/**
 * Whether the service hands out new sync IDs. Existing syncs keep working
 * either way.
 */
export class SyncAdmission {
  constructor(private accepting: boolean) {}

  isAccepting(): boolean {
    return this.accepting;
  }

  setAccepting(accepting: boolean): void {
    if (accepting !== this.accepting) {
      logger.info(`New syncs ${accepting ? 'enabled' : 'disabled'}`);
    }
    this.accepting = accepting;
  }

  /** Flip the flag and return the new value. */
  toggle(): boolean {
    this.setAccepting(!this.accepting);
    return this.accepting;
  }
}
