import { Clock, ProtectionState, ProtectionStatus } from '../types';

export interface ProtectionSettings {
  maxAttempts: number;
  freezeSeconds: number;
}

const DEFAULT_SETTINGS: ProtectionSettings = {
  maxAttempts: 5,
  freezeSeconds: 30
};

/**
 * Per-username failed-login counters and freezes, held in memory for the
 * lifetime of the process. Expired freezes are cleared lazily on the next
 * status check; there are no timers.
 */
export class AccountProtectionTracker {
  private readonly states = new Map<string, ProtectionState>();
  private readonly settings: ProtectionSettings;

  constructor(
    settings: Partial<ProtectionSettings> = {},
    private readonly clock: Clock = Date.now
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    if (this.settings.maxAttempts < 1 || this.settings.freezeSeconds <= 0) {
      throw new Error('Invalid account protection configuration');
    }
  }

  get maxAttempts(): number {
    return this.settings.maxAttempts;
  }

  get freezeSeconds(): number {
    return this.settings.freezeSeconds;
  }

  get trackedCount(): number {
    return this.states.size;
  }

  checkStatus(username: string): ProtectionStatus {
    const state = this.states.get(username);
    if (!state || state.frozenUntil === null) {
      return { status: 'clear' };
    }

    const remainingMs = state.frozenUntil - this.clock();
    if (remainingMs > 0) {
      return { status: 'frozen', remainingSeconds: Math.ceil(remainingMs / 1000) };
    }

    this.states.delete(username);
    return { status: 'clear' };
  }

  recordFailure(username: string): ProtectionStatus {
    const current = this.checkStatus(username);
    if (current.status === 'frozen') {
      return current;
    }

    const state = this.states.get(username) ?? { failedAttempts: 0, frozenUntil: null };
    state.failedAttempts += 1;

    if (state.failedAttempts >= this.settings.maxAttempts) {
      state.failedAttempts = 0;
      state.frozenUntil = this.clock() + this.settings.freezeSeconds * 1000;
    }

    this.states.set(username, state);
    return this.checkStatus(username);
  }

  recordSuccess(username: string): void {
    this.states.delete(username);
  }

  getState(username: string): ProtectionState {
    const state = this.states.get(username);
    return state ? { ...state } : { failedAttempts: 0, frozenUntil: null };
  }
}
