import { buildAggregatorConfig } from '../config/taxonomy';
import type { AggregatorConfig } from '../types';

export const makeConfig = (
  overrides: Partial<{ userScreenCap: number; cohortScreenCap: number }> = {},
  env: NodeJS.ProcessEnv = {}
): AggregatorConfig =>
  buildAggregatorConfig(
    {
      SCREEN_PROPERTY: 'screen_name',
      SCREEN_FALLBACK_PROPERTY: 'screen',
      USER_SCREEN_CAP: overrides.userScreenCap ?? 12,
      COHORT_SCREEN_CAP: overrides.cohortScreenCap ?? 12,
    },
    env
  );

// One user signs up, links a card and views the home screen
export const signupScenario = () => [
  { user_id: 'u1', event_type: 'signup_completed', event_time: '2025-03-15 10:00:00' },
  {
    user_id: 'u1',
    event_type: 'add_card_successful',
    event_time: '2025-03-15 10:05:00',
    session_id: 's1',
  },
  {
    user_id: 'u1',
    event_type: 'common_screen_view_tracker',
    event_time: '2025-03-15 10:06:00',
    session_id: 's1',
    event_properties: { screen_name: 'home' },
  },
];

export const screenView = (userId: string, screen: string, eventTime: string, sessionId = 's1') => ({
  user_id: userId,
  event_type: 'common_screen_view_tracker',
  event_time: eventTime,
  session_id: sessionId,
  event_properties: { screen_name: screen },
});
