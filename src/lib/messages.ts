import { PhonicsErrorType } from './errors';
import type { RandomSource } from './selection';

export const ENCOURAGEMENTS = [
  'Great job! ⭐',
  'Fantastic! 🌟',
  "You're a star! ✨",
  'Amazing! 🎉',
  'Well done! 👏',
  'Keep going! 💪',
  'Super! 🚀',
  'Brilliant! 🌈',
  'You did it! 🎊',
  'Wow, incredible! 🏆',
  'Perfect! 💯',
  'Champion! 🥇',
] as const;

export const TRY_AGAIN = [
  'Almost! Try again! 💪',
  'So close! One more time! 🌟',
  'You can do it! 🎯',
  "Don't give up! Keep trying! 💫",
] as const;

// Spoken after a correct answer when the curriculum has no phrases of its own
export const CHEERS = ['Correct!', 'Yes!', 'Great!'] as const;

export const WORD_DONE = 'Amazing! You did it!';

// Shown to the child when something went wrong behind the scenes
export const WARNING_MESSAGES: Record<PhonicsErrorType, string> = {
  [PhonicsErrorType.CURRICULUM_CORRUPT]: 'The letters are taking a nap. Ask a grown-up for help.',
  [PhonicsErrorType.PROFILE_NOT_FOUND]: "Hello! Let's start a brand new journey!",
  [PhonicsErrorType.STORAGE_CORRUPT]: "Let's start a fresh journey today!",
  [PhonicsErrorType.STORAGE_WRITE_FAILED]: "Your stars are safe for now. Let's keep playing!",
  [PhonicsErrorType.SYNTHESIS_FAILED]: 'The voice is resting. Look at the letters instead!',
  [PhonicsErrorType.SESSION_ALREADY_ACTIVE]: 'You are already playing!',
  [PhonicsErrorType.INVALID_COMMAND]: "Oops! Let's try that again.",
  [PhonicsErrorType.CONFIG_INVALID]: 'Something needs fixing. Ask a grown-up for help.',
};

export function pickMessage(messages: readonly string[], random: RandomSource): string {
  return messages[Math.floor(random() * messages.length) % messages.length];
}
