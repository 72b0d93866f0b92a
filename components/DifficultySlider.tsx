import React from 'react';
import { DIFFICULTY_BAND_COLORS, getDifficultyBand } from '../constants';
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from '../types';

interface DifficultySliderProps {
  value: number;
  onChange: (value: number) => void;
}

const DifficultySlider: React.FC<DifficultySliderProps> = ({ value, onChange }) => {
  const band = getDifficultyBand(value);

  return (
    <section className="bg-white/5 border border-white/10 rounded-2xl p-4">
      <div className="flex items-center justify-between mb-3">
        <label htmlFor="difficulty" className="text-sm font-bold uppercase tracking-wider text-indigo-200">
          Difficulty Level
        </label>
        <span className={`text-xl font-black ${DIFFICULTY_BAND_COLORS[band]}`}>
          {value}/{MAX_DIFFICULTY}
        </span>
      </div>
      <input
        id="difficulty"
        type="range"
        min={MIN_DIFFICULTY}
        max={MAX_DIFFICULTY}
        step={1}
        value={value}
        onChange={event => onChange(Number(event.target.value))}
        className="w-full accent-indigo-500"
      />
      <div className="flex justify-between text-xs text-gray-400 mt-1">
        <span>Easy</span>
        <span>{band}</span>
        <span>Expert</span>
      </div>
    </section>
  );
};

export default DifficultySlider;
