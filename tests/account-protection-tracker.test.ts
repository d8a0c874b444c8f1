import { AccountProtectionTracker } from '../src/services/account-protection-tracker';
import { ManualClock } from './support/fixtures';

describe('Account Protection Tracker', () => {
  let clock: ManualClock;
  let tracker: AccountProtectionTracker;

  beforeEach(() => {
    clock = new ManualClock();
    tracker = new AccountProtectionTracker({ maxAttempts: 5, freezeSeconds: 30 }, clock.now);
  });

  describe('Failure Counting', () => {
    it('should start every username clear', () => {
      expect(tracker.checkStatus('alice')).toEqual({ status: 'clear' });
      expect(tracker.getState('alice')).toEqual({ failedAttempts: 0, frozenUntil: null });
    });

    it('should count failures below the threshold without freezing', () => {
      for (let i = 0; i < 4; i++) {
        expect(tracker.recordFailure('alice')).toEqual({ status: 'clear' });
      }

      expect(tracker.getState('alice')).toEqual({ failedAttempts: 4, frozenUntil: null });
    });

    it('should freeze on the threshold failure and reset the counter', () => {
      for (let i = 0; i < 4; i++) {
        tracker.recordFailure('alice');
      }

      expect(tracker.recordFailure('alice')).toEqual({ status: 'frozen', remainingSeconds: 30 });
      expect(tracker.getState('alice')).toEqual({
        failedAttempts: 0,
        frozenUntil: clock.current + 30_000
      });
    });

    it('should not penalise failures recorded while frozen', () => {
      for (let i = 0; i < 5; i++) {
        tracker.recordFailure('alice');
      }
      const frozenState = tracker.getState('alice');

      clock.advanceSeconds(10);
      expect(tracker.recordFailure('alice')).toEqual({ status: 'frozen', remainingSeconds: 20 });
      expect(tracker.getState('alice')).toEqual(frozenState);
    });

    it('should keep usernames independent', () => {
      for (let i = 0; i < 5; i++) {
        tracker.recordFailure('alice');
      }
      tracker.recordFailure('bob');

      expect(tracker.checkStatus('alice').status).toBe('frozen');
      expect(tracker.checkStatus('bob')).toEqual({ status: 'clear' });
      expect(tracker.getState('bob').failedAttempts).toBe(1);
    });
  });

  describe('Success Handling', () => {
    it('should reset partial failures on success', () => {
      tracker.recordFailure('alice');
      tracker.recordFailure('alice');
      tracker.recordFailure('alice');
      tracker.recordSuccess('alice');

      for (let i = 0; i < 4; i++) {
        expect(tracker.recordFailure('alice')).toEqual({ status: 'clear' });
      }
      expect(tracker.recordFailure('alice').status).toBe('frozen');
    });

    it('should clear an active freeze on success', () => {
      for (let i = 0; i < 5; i++) {
        tracker.recordFailure('alice');
      }

      tracker.recordSuccess('alice');

      expect(tracker.checkStatus('alice')).toEqual({ status: 'clear' });
    });
  });

  describe('Lazy Expiry', () => {
    beforeEach(() => {
      for (let i = 0; i < 5; i++) {
        tracker.recordFailure('alice');
      }
    });

    it('should report remaining time rounded up to whole seconds', () => {
      clock.current += 29_500;

      expect(tracker.checkStatus('alice')).toEqual({ status: 'frozen', remainingSeconds: 1 });
    });

    it('should clear the freeze once the duration has elapsed', () => {
      clock.advanceSeconds(30);

      expect(tracker.checkStatus('alice')).toEqual({ status: 'clear' });
      expect(tracker.getState('alice')).toEqual({ failedAttempts: 0, frozenUntil: null });
    });

    it('should forget usernames whose freeze has expired', () => {
      for (let i = 0; i < 5; i++) {
        tracker.recordFailure(`guess-${i}`);
      }
      expect(tracker.trackedCount).toBe(6);

      clock.advanceSeconds(30);
      tracker.checkStatus('alice');

      expect(tracker.trackedCount).toBe(5);
    });

    it('should drop the entry of a successful login', () => {
      tracker.recordSuccess('alice');

      expect(tracker.trackedCount).toBe(0);
    });

    it('should start a fresh count after the freeze expires', () => {
      clock.advanceSeconds(31);

      expect(tracker.recordFailure('alice')).toEqual({ status: 'clear' });
      expect(tracker.getState('alice').failedAttempts).toBe(1);
    });
  });

  describe('Configuration', () => {
    it('should use five attempts and thirty seconds by default', () => {
      const defaults = new AccountProtectionTracker();

      expect(defaults.maxAttempts).toBe(5);
      expect(defaults.freezeSeconds).toBe(30);
    });

    it('should honour a custom threshold', () => {
      const strict = new AccountProtectionTracker({ maxAttempts: 2, freezeSeconds: 60 }, clock.now);

      strict.recordFailure('alice');

      expect(strict.recordFailure('alice')).toEqual({ status: 'frozen', remainingSeconds: 60 });
    });

    it('should reject a zero threshold', () => {
      expect(() => new AccountProtectionTracker({ maxAttempts: 0 }))
        .toThrow('Invalid account protection configuration');
    });
  });
});
