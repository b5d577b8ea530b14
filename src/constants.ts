export const MILLISECONDS_PER_SECOND = 1000;
export const SECONDS_PER_MINUTE = 60;
export const MINUTES_PER_HOUR = 60;

export const MILLISECONDS_PER_MINUTE = MILLISECONDS_PER_SECOND * SECONDS_PER_MINUTE;

export const DEFAULT_BLOCK_MINUTES = 15;
export const DEFAULT_HORIZON_HOURS = 12;
export const DEFAULT_MEETING_BUFFER_MINUTES = 20;
export const DEFAULT_CALENDAR_QUERY_LIMIT = 80;

export const DEFAULT_TASK_DURATION = 30;
export const LOW_INTENSITY_TASK_DURATION = 10;
export const MIN_ENTRY_DURATION = 5;
export const MAX_ENTRY_DURATION = 240;

export const MAX_ENTRY_TITLE_LENGTH = 140;
export const MAX_TASK_TITLE_LENGTH = 160;

export const MAX_STAGGERED_SLOTS = 5;
export const MAX_STAGGER_OFFSETS = 6;
export const DEFAULT_STAGGER_OFFSETS: readonly number[] = [0, 30, 90, 180];

export const UNSCHEDULED = 'unscheduled';

export const DEFAULT_MORNING_HOUR = 9;
export const DEFAULT_EVENING_HOUR = 18;

// Labels containing one of these words are treated as meetings when placing naps.
export const MEETING_KEYWORDS: readonly string[] = [
  'meeting',
  'call',
  'sync',
  'standup',
  'interview',
  'demo',
  'appointment',
  'review',
];

// Task titles containing one of these are low-intensity (rest) activities.
export const LOW_INTENSITY_KEYWORDS: readonly string[] = ['nap', 'power nap', 'sleep', 'rest'];

export const LOW_ENERGY_MOODS = ['tired', 'anxious', 'overwhelmed'] as const;
export const HIGH_FOCUS_MOODS = ['focused', 'motivated'] as const;
