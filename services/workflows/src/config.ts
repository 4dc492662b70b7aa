import { z } from 'zod';

export interface WorkflowsConfig {
  host: string;
  port: number;
  logLevel: string;
  demoUserId: string;
  demoUsername: string;
  seedDemo: boolean;
  templatesDir?: string;
}

export type EnvSource = Record<string, string | undefined>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const booleanVar = (fallback: boolean) =>
  optionalText.transform((value, ctx) => {
    if (value === undefined) {
      return fallback;
    }
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, received '${value}'` });
    return z.NEVER;
  });

const envSchema = z.object({
  WORKFLOWS_HOST: optionalText,
  WORKFLOWS_PORT: optionalText.pipe(z.coerce.number().int().positive().max(65535).default(4300)),
  WORKFLOWS_LOG_LEVEL: optionalText.pipe(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  ),
  WORKFLOWS_DEMO_USER_ID: optionalText,
  WORKFLOWS_DEMO_USERNAME: optionalText,
  WORKFLOWS_SEED_DEMO: booleanVar(true),
  WORKFLOWS_TEMPLATES_DIR: optionalText
});

const formatIssue = (issue: z.ZodIssue): string => {
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
};

export const loadConfig = (env: EnvSource = process.env): WorkflowsConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `  - ${formatIssue(issue)}`).join('\n');
    throw new ConfigError(`Invalid workflows service configuration\n${details}`);
  }

  const parsed = result.data;
  return {
    host: parsed.WORKFLOWS_HOST ?? '0.0.0.0',
    port: parsed.WORKFLOWS_PORT,
    logLevel: parsed.WORKFLOWS_LOG_LEVEL,
    demoUserId: parsed.WORKFLOWS_DEMO_USER_ID ?? 'demo-user',
    demoUsername: parsed.WORKFLOWS_DEMO_USERNAME ?? 'demo',
    seedDemo: parsed.WORKFLOWS_SEED_DEMO,
    templatesDir: parsed.WORKFLOWS_TEMPLATES_DIR
  };
};
