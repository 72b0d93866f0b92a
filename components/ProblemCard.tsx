import React from 'react';
import { TOPIC_STYLES } from '../constants';
import { MAX_DIFFICULTY, type Question } from '../types';
import { CheckCircleIcon, XCircleIcon } from './icons';

interface ProblemCardProps {
  problem: Question;
  selectedAnswer: number | null;
  showSolution: boolean;
  onSelect: (index: number) => void;
}

const optionClasses = (index: number, problem: Question, selectedAnswer: number | null, showSolution: boolean): string => {
  const isSelected = selectedAnswer === index;
  if (showSolution) {
    if (index === problem.correctAnswer) {
      return "bg-emerald-500/20 border-emerald-500/50 text-emerald-100 ring-1 ring-emerald-500/50";
    }
    if (isSelected) {
      return "bg-rose-500/20 border-rose-500/50 text-rose-100 ring-1 ring-rose-500/50";
    }
    return "bg-black/20 text-gray-600 border-transparent opacity-60";
  }
  if (isSelected) {
    return "bg-indigo-600 text-white border-indigo-500 ring-2 ring-indigo-400/50";
  }
  return "bg-white/5 hover:bg-white/10 border-white/5 text-gray-300";
};

const ProblemCard: React.FC<ProblemCardProps> = ({ problem, selectedAnswer, showSolution, onSelect }) => {
  const isCorrect = selectedAnswer === problem.correctAnswer;

  return (
    <div className="bg-gray-900/40 backdrop-blur-2xl rounded-[2rem] shadow-2xl border border-white/10 overflow-hidden relative">
      <div className="absolute top-0 left-0 w-full h-1 bg-gradient-to-r from-indigo-500 via-purple-500 to-pink-500"></div>

      <div className="p-6 md:p-10">
        <div className="flex items-center justify-between mb-6 text-xs font-bold uppercase tracking-wider">
          <span className={TOPIC_STYLES[problem.topic].accent}>{problem.topic}</span>
          <span className="text-gray-400">Level {problem.difficulty}/{MAX_DIFFICULTY}</span>
        </div>

        <h2 className="text-xl md:text-2xl font-medium text-gray-100 leading-relaxed mb-8">{problem.question}</h2>

        <div className="grid grid-cols-1 gap-3">
          {problem.options.map((option, index) => (
            <button
              key={index}
              type="button"
              onClick={() => onSelect(index)}
              disabled={showSolution}
              className={`w-full p-4 rounded-2xl text-left font-medium border transition-all duration-200 flex items-center ${optionClasses(index, problem, selectedAnswer, showSolution)}`}
            >
              <span className="flex-shrink-0 inline-flex items-center justify-center w-9 h-9 rounded-xl text-sm font-bold mr-4 bg-black/20">
                {String.fromCharCode(65 + index)}
              </span>
              {option}
            </button>
          ))}
        </div>
      </div>

      {showSolution && (
        <div className="bg-black/20 p-6 md:p-8 border-t border-white/5 animate-fadeIn">
          {isCorrect ? (
            <div className="flex items-center text-emerald-400 font-bold mb-3">
              <CheckCircleIcon className="w-6 h-6 mr-3" />
              Correct!
            </div>
          ) : (
            <div className="flex items-center text-rose-400 font-bold mb-3">
              <XCircleIcon className="w-6 h-6 mr-3" />
              Incorrect
            </div>
          )}
          <h3 className="text-xs font-bold uppercase tracking-wider text-indigo-200 mb-1">Explanation</h3>
          <p className="text-gray-300 leading-relaxed">{problem.explanation}</p>
        </div>
      )}
    </div>
  );
};

export default ProblemCard;
