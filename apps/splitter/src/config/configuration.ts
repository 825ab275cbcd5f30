const parseNumberEnv = (value: string | undefined, fallback: number): number =>
  value !== undefined && value !== '' ? Number(value) : fallback;

export default () => ({
  env: process.env.NODE_ENV ?? 'development',
  logging: {
    level: process.env.SILENT === 'true' ? 'error' : (process.env.LOG_LEVEL ?? 'info'),
    structured: process.env.STRUCTURED_LOGS !== 'false',
  },
  acars: {
    host: process.env.ACARS_HOST ?? '127.0.0.1',
    outputDir: process.env.ACARS_OUTPUT_DIR ?? 'acars_split',
    bufferTimeout: parseNumberEnv(process.env.ACARS_BUFFER_TIMEOUT, 60),
  },
});
