export interface AppConfig {
  parser: {
    logSummary: boolean;
  };
}

// Only diagnostics are configurable; what gets loaded never depends on the environment.
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    parser: {
      logSummary: env.LEDGER_LOG_SUMMARY === 'true',
    },
  };
};
