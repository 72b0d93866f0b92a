import React from 'react';
import type { SessionSnapshot } from '../types';
import { SparklesIcon } from './icons';

interface ActionButtonsProps {
  snapshot: SessionSnapshot;
  onGenerate: () => void;
  onCheck: () => void;
}

const ActionButtons: React.FC<ActionButtonsProps> = ({ snapshot, onGenerate, onCheck }) => {
  const { isLoading, selectedTopics, currentProblem, selectedAnswer, showSolution } = snapshot;
  const canCheck = currentProblem !== null && selectedAnswer !== null && !showSolution;

  return (
    <div className="flex flex-col gap-3">
      <button
        type="button"
        onClick={onGenerate}
        disabled={selectedTopics.length === 0 || isLoading}
        className="w-full inline-flex items-center justify-center gap-2 py-4 rounded-2xl font-bold text-white bg-gradient-to-r from-indigo-600 to-purple-600 hover:from-indigo-500 hover:to-purple-500 disabled:opacity-50 disabled:cursor-not-allowed transition-all"
      >
        {isLoading ? (
          <span className="w-5 h-5 border-2 border-white/30 border-t-white rounded-full animate-spin"></span>
        ) : (
          <SparklesIcon className="w-5 h-5" />
        )}
        Generate AI Problem
      </button>
      <div className="flex gap-3">
        <button
          type="button"
          onClick={onCheck}
          disabled={!canCheck}
          className="flex-1 py-3 rounded-xl font-bold bg-emerald-600 hover:bg-emerald-500 text-white disabled:bg-gray-800 disabled:text-gray-600 disabled:cursor-not-allowed transition-all"
        >
          Check Answer
        </button>
        <button
          type="button"
          onClick={onGenerate}
          disabled={isLoading}
          className="flex-1 py-3 rounded-xl font-bold bg-indigo-600 hover:bg-indigo-500 text-white disabled:bg-gray-800 disabled:text-gray-600 disabled:cursor-not-allowed transition-all"
        >
          Next Problem
        </button>
      </div>
    </div>
  );
};

export default ActionButtons;
