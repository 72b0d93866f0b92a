import type React from 'react';
import { BeakerIcon, BoltIcon, GlobeIcon, HeartIcon, MoonIcon, SunIcon, type IconProps } from './components/icons';
import { DifficultyBand, Topic } from './types';

interface TopicStyle {
  shortLabel: string;
  icon: React.FC<IconProps>;
  accent: string; // text colour for icons and labels
  selected: string; // card background + border when the topic is on
}

export const TOPIC_STYLES: Record<Topic, TopicStyle> = {
  [Topic.Biology]: { shortLabel: 'Biology', icon: HeartIcon, accent: 'text-green-400', selected: 'bg-green-500/20 border-green-400' },
  [Topic.Chemistry]: { shortLabel: 'Chemistry', icon: BeakerIcon, accent: 'text-blue-400', selected: 'bg-blue-500/20 border-blue-400' },
  [Topic.Physics]: { shortLabel: 'Physics', icon: BoltIcon, accent: 'text-purple-400', selected: 'bg-purple-500/20 border-purple-400' },
  [Topic.EarthScience]: { shortLabel: 'Earth', icon: GlobeIcon, accent: 'text-amber-600', selected: 'bg-amber-700/20 border-amber-600' },
  [Topic.Astronomy]: { shortLabel: 'Astronomy', icon: MoonIcon, accent: 'text-indigo-400', selected: 'bg-indigo-500/20 border-indigo-400' },
  [Topic.Environmental]: { shortLabel: 'Environmental', icon: SunIcon, accent: 'text-teal-400', selected: 'bg-teal-500/20 border-teal-400' },
};

export const DEFAULT_TOPICS: readonly Topic[] = [Topic.Biology, Topic.Chemistry, Topic.Physics];
export const DEFAULT_DIFFICULTY = 5;

export const getDifficultyBand = (difficulty: number): DifficultyBand => {
  if (difficulty <= 3) return DifficultyBand.Easy;
  if (difficulty <= 6) return DifficultyBand.Medium;
  if (difficulty <= 8) return DifficultyBand.Hard;
  return DifficultyBand.Expert;
};

export const DIFFICULTY_BAND_COLORS: Record<DifficultyBand, string> = {
  [DifficultyBand.Easy]: 'text-green-400',
  [DifficultyBand.Medium]: 'text-yellow-400',
  [DifficultyBand.Hard]: 'text-orange-400',
  [DifficultyBand.Expert]: 'text-red-400',
};

export const NO_TOPICS_MESSAGE = 'Please select at least one topic';
export const UNKNOWN_ERROR_MESSAGE = 'An unknown error occurred.';
