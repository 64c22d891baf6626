const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export default () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  database: {
    host: process.env.DATABASE_HOST || 'localhost',
    port: int(process.env.DATABASE_PORT, 5432),
    username: process.env.DATABASE_USERNAME || 'postgres',
    password: process.env.DATABASE_PASSWORD || 'postgres',
    database: process.env.DATABASE_NAME || 'group_standings',
    poolSize: int(process.env.DATABASE_POOL_SIZE, 10),
    connectionTimeoutMillis: int(process.env.DATABASE_TIMEOUT, 5000),
  },
  standings: {
    defaultPreset: process.env.STANDINGS_DEFAULT_PRESET || 'fifa-2018',
    logSteps: process.env.STANDINGS_LOG_STEPS === 'true', // Default: false
  },
});
