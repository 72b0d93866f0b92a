import React from 'react';
import { TOPIC_STYLES } from '../constants';
import { ALL_TOPICS, type Topic } from '../types';

interface TopicGridProps {
  selected: readonly Topic[];
  onToggle: (topic: Topic) => void;
}

const TopicGrid: React.FC<TopicGridProps> = ({ selected, onToggle }) => (
  <section>
    <h3 className="text-sm font-bold uppercase tracking-wider text-indigo-200 mb-3">Topics</h3>
    <div className="flex gap-3 overflow-x-auto pb-2">
      {ALL_TOPICS.map(topic => {
        const style = TOPIC_STYLES[topic];
        const Icon = style.icon;
        const isSelected = selected.includes(topic);
        return (
          <button
            key={topic}
            type="button"
            aria-pressed={isSelected}
            onClick={() => onToggle(topic)}
            className={`flex-shrink-0 w-24 h-20 rounded-2xl border-2 flex flex-col items-center justify-center gap-1 transition-all duration-200 ${
              isSelected ? style.selected : 'bg-white/5 border-transparent hover:bg-white/10'
            }`}
          >
            <Icon className={`w-7 h-7 ${style.accent}`} />
            <span className="text-xs font-bold text-gray-200">{style.shortLabel}</span>
          </button>
        );
      })}
    </div>
  </section>
);

export default TopicGrid;
