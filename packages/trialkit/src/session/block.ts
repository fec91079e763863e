import type { Session } from './session.js';
import type { SettingsParent } from '../settings.js';
import { Settings } from '../settings.js';
import { Trial } from './trial.js';
import { NoSuchTrialError } from '../errors.js';

/**
 * An ordered group of trials sharing configuration. The trial count is fixed
 * when the block is made; use `session.createBlock()` rather than `new`.
 */
export class Block implements SettingsParent {
  readonly session: Session;
  /** Block settings. These override session settings when set. */
  readonly settings: Settings;
  readonly trials: readonly Trial[];

  constructor(numberOfTrials: number, session: Session) {
    this.session = session;
    this.settings = Settings.empty(session);
    const trials: Trial[] = [];
    for (let i = 0; i < numberOfTrials; i++) trials.push(new Trial(this));
    this.trials = trials;
  }

  /** 1-based position in the session's block list. */
  get number(): number {
    return this.session.blocks.indexOf(this) + 1;
  }

  get firstTrial(): Trial {
    if (this.trials.length === 0) {
      throw new NoSuchTrialError(`Block ${this.number} has no trials`);
    }
    return this.trials[0];
  }

  get lastTrial(): Trial {
    if (this.trials.length === 0) {
      throw new NoSuchTrialError(`Block ${this.number} has no trials`);
    }
    return this.trials[this.trials.length - 1];
  }

  /** Trial by its 1-based number within this block. */
  getRelativeTrial(numberInBlock: number): Trial {
    const trial = this.trials[numberInBlock - 1];
    if (!Number.isInteger(numberInBlock) || !trial) {
      throw new NoSuchTrialError(`Block ${this.number} has no trial ${numberInBlock}`);
    }
    return trial;
  }
}
