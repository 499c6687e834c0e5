import { ACTION_COUNTERS, USER_FLAGS } from '../types';
import type {
  ActionCounter,
  ActionKind,
  EventRecord,
  ScreenSighting,
  UserFlag,
  UserState,
} from '../types';

interface ActionEffect {
  flag?: UserFlag;
  counter?: ActionCounter;
}

// What each canonical action does to the owning user's state
const ACTION_EFFECTS: Record<ActionKind, ActionEffect> = {
  signup_started: { flag: 'signup_started' },
  signup_completed: { flag: 'signup_completed' },
  signup_failed: { flag: 'signup_failed' },
  onboarding_completed: { flag: 'onboarding_completed' },
  card_link_success: { flag: 'card_linked', counter: 'cards_count' },
  card_link_failed: { flag: 'card_link_failed' },
  bank_link_success: { flag: 'bank_linked', counter: 'banks_count' },
  bank_link_failed: { flag: 'bank_link_failed' },
  autopay_enabled: { flag: 'autopay_enabled' },
  income_added: { flag: 'income_added' },
  bill_payment: { counter: 'bill_payments_made' },
  churned: { flag: 'churned' },
  fraud_blocked: { flag: 'fraud_blocked' },
  used_credgpt: { flag: 'used_credgpt' },
  used_spinwheel: { flag: 'used_spinwheel' },
  used_rewards: { flag: 'used_rewards' },
  screen_view: {},
};

export function createUserState(userId: string): UserState {
  return {
    user_id: userId,
    signup_started: false,
    signup_completed: false,
    signup_failed: false,
    onboarding_completed: false,
    card_linked: false,
    card_link_failed: false,
    bank_linked: false,
    bank_link_failed: false,
    autopay_enabled: false,
    income_added: false,
    churned: false,
    fraud_blocked: false,
    used_credgpt: false,
    used_spinwheel: false,
    used_rewards: false,
    cards_count: 0,
    banks_count: 0,
    bill_payments_made: 0,
    event_count: 0,
    screens: new Map(),
    session_ids: new Set(),
    session_windows: new Map(),
  };
}

/**
 * Orders screen sightings by first event time; sightings without a usable
 * timestamp go after timed ones, and input position breaks ties.
 */
export function compareSightings(a: ScreenSighting, b: ScreenSighting): number {
  if (a.firstSeenAt !== null && b.firstSeenAt !== null && a.firstSeenAt !== b.firstSeenAt) {
    return a.firstSeenAt - b.firstSeenAt;
  }
  if (a.firstSeenAt === null && b.firstSeenAt !== null) return 1;
  if (a.firstSeenAt !== null && b.firstSeenAt === null) return -1;
  return a.sequence - b.sequence;
}

function keepEarliestSighting(
  screens: Map<string, ScreenSighting>,
  screen: string,
  sighting: ScreenSighting
): void {
  const existing = screens.get(screen);
  if (!existing || compareSightings(sighting, existing) < 0) {
    screens.set(screen, sighting);
  }
}

export class UserStateAccumulator {
  private readonly users = new Map<string, UserState>();

  constructor(
    private readonly screenProperty: string,
    private readonly screenFallbackProperty: string
  ) {}

  getOrCreate(userId: string): UserState {
    let state = this.users.get(userId);
    if (!state) {
      state = createUserState(userId);
      this.users.set(userId, state);
    }
    return state;
  }

  /** Flags are set at most once; counters move once per matching event. */
  apply(state: UserState, kind: ActionKind): void {
    const effect = ACTION_EFFECTS[kind];
    if (effect.flag) {
      state[effect.flag] = true;
    }
    if (effect.counter) {
      state[effect.counter] += 1;
    }
  }

  /**
   * Reads the screen id from the primary property, then the fallback. Non-empty
   * strings and non-zero numeric ids count; numbers are stringified.
   */
  extractScreen(event: EventRecord): string | undefined {
    const properties = event.event_properties;
    if (!properties) {
      return undefined;
    }
    for (const key of [this.screenProperty, this.screenFallbackProperty]) {
      const value = properties[key];
      if (typeof value === 'string' && value !== '') {
        return value;
      }
      if (typeof value === 'number' && Number.isFinite(value) && value !== 0) {
        return String(value);
      }
    }
    return undefined;
  }

  recordScreen(state: UserState, screen: string, sighting: ScreenSighting): void {
    keepEarliestSighting(state.screens, screen, sighting);
  }

  entries(): Map<string, UserState> {
    return this.users;
  }
}

/** Folds `source` into `target`: flags OR, counters sum, earliest screen sighting. */
export function mergeUserStates(target: UserState, source: UserState): void {
  for (const flag of USER_FLAGS) {
    target[flag] = target[flag] || source[flag];
  }
  for (const counter of ACTION_COUNTERS) {
    target[counter] += source[counter];
  }
  target.event_count += source.event_count;

  for (const [screen, sighting] of source.screens) {
    keepEarliestSighting(target.screens, screen, { ...sighting });
  }
  for (const sessionId of source.session_ids) {
    target.session_ids.add(sessionId);
  }
}

/** Distinct screens in first-seen order, capped for display. */
export function displayScreens(state: UserState, cap: number): string[] {
  return [...state.screens.entries()]
    .sort(([, a], [, b]) => compareSightings(a, b))
    .slice(0, cap)
    .map(([screen]) => screen);
}
