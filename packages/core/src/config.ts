// Environment-backed defaults. CLI flags always win over these.

export const ENV = {
  TEX_BIN: 'SRCPRESS_TEX_BIN',
  TEMPLATE_DIR: 'SRCPRESS_TEMPLATE_DIR',
} as const;

export const getEnv = (key: string, env: NodeJS.ProcessEnv = process.env): string | undefined => {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
};
