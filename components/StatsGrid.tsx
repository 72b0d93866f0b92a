import React from 'react';
import { accuracy } from '../services/sessionState';
import type { Statistics } from '../types';

interface StatItemProps {
  value: string;
  label: string;
}

const StatItem: React.FC<StatItemProps> = ({ value, label }) => (
  <div className="flex-1 bg-indigo-500/10 rounded-xl py-4 text-center">
    <div className="text-2xl font-black text-indigo-300">{value}</div>
    <div className="text-xs text-gray-400">{label}</div>
  </div>
);

const StatsGrid: React.FC<{ stats: Readonly<Statistics> }> = ({ stats }) => (
  <div className="flex gap-3">
    <StatItem value={String(stats.correct)} label="Correct" />
    <StatItem value={String(stats.total)} label="Total" />
    <StatItem value={`${Math.floor(accuracy(stats) * 100)}%`} label="Accuracy" />
    <StatItem value={String(stats.streak)} label="Streak" />
  </div>
);

export default StatsGrid;
