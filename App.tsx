import React, { useState } from 'react';
import { useSessionState } from './hooks/useSessionState';
import { accuracy, type SessionState } from './services/sessionState';
import { ALL_TOPICS } from './types';
import { TOPIC_STYLES } from './constants';
import ActionButtons from './components/ActionButtons';
import DifficultySlider from './components/DifficultySlider';
import ProblemCard from './components/ProblemCard';
import ProgressBar from './components/ProgressBar';
import StatsGrid from './components/StatsGrid';
import TopicGrid from './components/TopicGrid';
import { CheckCircleIcon, FlameIcon, SparklesIcon, TrophyIcon, XCircleIcon } from './components/icons';

enum Tab {
  Practice = "Practice",
  Stats = "Stats",
  Settings = "Settings",
}

interface AppProps {
  session: SessionState;
}

const App: React.FC<AppProps> = ({ session }) => {
  const snapshot = useSessionState(session);
  const [tab, setTab] = useState<Tab>(Tab.Practice);
  const { stats } = snapshot;

  const handleGenerate = () => {
    void session.generate();
  };

  const renderPracticeScreen = () => (
    <div className="flex flex-col gap-6">
      <header className="text-center">
        <h1 className="text-4xl font-black bg-gradient-to-r from-white via-indigo-200 to-indigo-400 text-transparent bg-clip-text tracking-tight">
          AI Science Practice
        </h1>
        <p className="text-gray-400 mt-1">Multiple-choice questions generated on demand</p>
      </header>

      <TopicGrid selected={snapshot.selectedTopics} onToggle={topic => session.toggleTopic(topic)} />
      <DifficultySlider value={snapshot.difficulty} onChange={value => session.setDifficulty(value)} />

      {snapshot.errorMessage && (
        <div role="alert" className="flex items-start gap-3 bg-red-500/10 border border-red-500/20 text-red-200 px-5 py-4 rounded-2xl">
          <XCircleIcon className="w-6 h-6 flex-shrink-0 text-red-400" />
          <p className="text-sm leading-relaxed">{snapshot.errorMessage}</p>
        </div>
      )}

      {snapshot.isLoading ? (
        <div className="flex flex-col items-center space-y-4 py-10">
          <div className="relative w-14 h-14">
            <div className="absolute inset-0 border-4 border-indigo-500/20 rounded-full"></div>
            <div className="absolute inset-0 border-4 border-t-indigo-500 rounded-full animate-spin"></div>
          </div>
          <p className="text-indigo-200 animate-pulse font-medium">Generating your question...</p>
        </div>
      ) : snapshot.currentProblem ? (
        <ProblemCard
          problem={snapshot.currentProblem}
          selectedAnswer={snapshot.selectedAnswer}
          showSolution={snapshot.showSolution}
          onSelect={index => session.selectAnswer(index)}
        />
      ) : (
        <div className="text-center py-10 text-gray-400">
          <SparklesIcon className="w-12 h-12 mx-auto mb-3 text-indigo-300" />
          <p>Pick your topics and generate a problem to begin.</p>
        </div>
      )}

      <StatsGrid stats={stats} />
      <ActionButtons snapshot={snapshot} onGenerate={handleGenerate} onCheck={() => session.reveal()} />
    </div>
  );

  const renderStatsScreen = () => (
    <div className="flex flex-col gap-6">
      <h2 className="text-3xl font-bold text-center">Statistics</h2>
      <div className="grid grid-cols-2 gap-4">
        <StatCard title="Total Problems" value={String(stats.total)} icon={<SparklesIcon className="w-7 h-7 text-blue-400" />} />
        <StatCard title="Correct Answers" value={String(stats.correct)} icon={<CheckCircleIcon className="w-7 h-7 text-green-400" />} />
        <StatCard title="Current Streak" value={String(stats.streak)} icon={<FlameIcon className="w-7 h-7 text-orange-400" />} />
        <StatCard title="Best Streak" value={String(stats.bestStreak)} icon={<TrophyIcon className="w-7 h-7 text-yellow-400" />} />
      </div>
      <ProgressBar label="Accuracy" current={stats.correct} total={stats.total} />
      <p className="text-center text-sm text-gray-400">
        {stats.total > 0 ? `${Math.floor(accuracy(stats) * 100)}% of generated problems answered correctly` : 'No problems generated yet'}
      </p>
    </div>
  );

  const renderSettingsScreen = () => (
    <div className="flex flex-col gap-6">
      <h2 className="text-3xl font-bold text-center">Topics &amp; Settings</h2>
      <fieldset className="bg-white/5 border border-white/10 rounded-2xl p-4">
        <legend className="text-sm font-bold uppercase tracking-wider text-indigo-200 px-1">Selected Topics</legend>
        {ALL_TOPICS.map(topic => (
          <label key={topic} className="flex items-center justify-between py-2">
            <span className={TOPIC_STYLES[topic].accent}>{topic}</span>
            <input
              type="checkbox"
              checked={snapshot.selectedTopics.includes(topic)}
              onChange={() => session.toggleTopic(topic)}
              className="w-5 h-5 accent-indigo-500"
            />
          </label>
        ))}
      </fieldset>
      <DifficultySlider value={snapshot.difficulty} onChange={value => session.setDifficulty(value)} />
      <button
        type="button"
        onClick={() => session.resetStatistics()}
        className="w-full py-3 rounded-xl font-bold bg-red-500/20 hover:bg-red-500/40 text-red-200 transition-colors"
      >
        Reset Statistics
      </button>
      <div className="flex items-center gap-3 text-gray-400">
        <SparklesIcon className="w-8 h-8 text-indigo-300" />
        <div>
          <p className="font-bold text-gray-200">Science Practice v1.0</p>
          <p className="text-xs">AI Science Practice Platform</p>
        </div>
      </div>
    </div>
  );

  return (
    <main className="min-h-screen w-full flex justify-center p-4 bg-[#0A0A0A] text-white font-sans selection:bg-indigo-500/30 relative">
      <div className="fixed top-[-20%] left-[-10%] w-[600px] h-[600px] bg-indigo-600/20 rounded-full blur-[120px] pointer-events-none"></div>

      <div className="relative z-10 w-full max-w-2xl pb-24">
        {tab === Tab.Practice && renderPracticeScreen()}
        {tab === Tab.Stats && renderStatsScreen()}
        {tab === Tab.Settings && renderSettingsScreen()}
      </div>

      <nav className="fixed bottom-0 left-0 right-0 z-20 flex justify-around bg-gray-900/90 backdrop-blur-md border-t border-white/10 py-3">
        {Object.values(Tab).map(item => (
          <button
            key={item}
            type="button"
            onClick={() => setTab(item)}
            className={`px-6 py-2 rounded-xl text-sm font-bold transition-colors ${
              tab === item ? 'bg-gray-700 text-white' : 'text-gray-400 hover:text-white'
            }`}
          >
            {item}
          </button>
        ))}
      </nav>
    </main>
  );
};

interface StatCardProps {
  title: string;
  value: string;
  icon: React.ReactNode;
}

const StatCard: React.FC<StatCardProps> = ({ title, value, icon }) => (
  <div className="bg-gray-800/50 p-5 rounded-2xl border border-white/5 flex flex-col items-center gap-2">
    {icon}
    <div className="text-4xl font-black tracking-tighter">{value}</div>
    <div className="text-xs text-gray-400 uppercase tracking-widest font-bold">{title}</div>
  </div>
);

export default App;
