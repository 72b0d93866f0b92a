import { defineConfig, loadEnv } from 'vite';
import react from '@vitejs/plugin-react';

const ENV_KEYS = [
  'PROBLEM_PROVIDER',
  'GROQ_API_KEY',
  'GROQ_API_URL',
  'GROQ_MODEL',
  'GEMINI_API_KEY',
  'GEMINI_MODEL',
  'REQUEST_TIMEOUT_MS',
] as const;

// https://vitejs.dev/config/
export default defineConfig(({ mode }) => {
  // The third parameter '' means load ALL env vars, not just VITE_ ones.
  const env = loadEnv(mode, process.cwd(), '');

  // process.env (CI/system) wins over the .env file; '' keeps 'undefined' out of the bundle
  const getEnv = (key: string) => process.env[key] || env[key] || "";

  return {
    plugins: [react()],
    define: Object.fromEntries(
      ENV_KEYS.map(key => [`process.env.${key}`, JSON.stringify(getEnv(key))])
    ),
  };
});
