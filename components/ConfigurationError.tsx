import React from 'react';
import { XCircleIcon } from './icons';

interface ConfigurationErrorProps {
  message: string;
}

// Shown instead of the app when startup aborts.
const ConfigurationError: React.FC<ConfigurationErrorProps> = ({ message }) => (
  <main className="min-h-screen w-full flex items-center justify-center p-4 bg-[#0A0A0A] text-white font-sans">
    <div role="alert" className="bg-red-500/10 border border-red-500/20 text-red-200 px-8 py-8 rounded-3xl max-w-lg mx-auto shadow-2xl text-center">
      <div className="flex items-center justify-center mb-4">
        <div className="bg-red-500/20 p-3 rounded-full">
          <XCircleIcon className="w-8 h-8 text-red-400" />
        </div>
      </div>
      <p className="font-bold text-xl mb-2">Configuration Error</p>
      <p className="text-sm opacity-80 leading-relaxed">{message}</p>
    </div>
  </main>
);

export default ConfigurationError;
