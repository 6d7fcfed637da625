import type { SettingsStore } from '../memory/settings.js';
import type { CallerProfile, RelayOutcome } from './types.js';

const INTERVAL_KEY_PREFIX = 'pacing.interval:';

export class CallerRegistry {
  private readonly profiles = new Map<string, CallerProfile>();
  private readonly privileged: Set<string>;

  constructor(
    privilegedIds: Iterable<string | number>,
    private readonly settings: SettingsStore | null = null
  ) {
    this.privileged = new Set(Array.from(privilegedIds, (id) => String(id)));
  }

  get(callerId: string | number): CallerProfile {
    const id = String(callerId);
    const existing = this.profiles.get(id);
    if (existing) return existing;

    const profile: CallerProfile = {
      id,
      tier: this.privileged.has(id) ? 'privileged' : 'standard',
      lastOperationAt: null,
      requestCount: 0,
      successCount: 0,
      intervalOverrideMs: this.settings?.getNumber(`${INTERVAL_KEY_PREFIX}${id}`) ?? null,
    };
    this.profiles.set(id, profile);
    return profile;
  }

  /** Persist a caller's own spacing between operations; null restores the tier default. */
  setIntervalOverride(callerId: string | number, intervalMs: number | null): CallerProfile {
    const profile = this.get(callerId);
    profile.intervalOverrideMs = intervalMs;
    const key = `${INTERVAL_KEY_PREFIX}${profile.id}`;
    if (intervalMs === null) {
      this.settings?.delete(key);
    } else {
      this.settings?.set(key, intervalMs);
    }
    return profile;
  }

  recordOutcome(profile: CallerProfile, outcome: RelayOutcome): void {
    profile.requestCount += 1;
    if (outcome.status === 'success') {
      profile.successCount += 1;
    }
  }
}
