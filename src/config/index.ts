import { z } from 'zod';
import { ValidationError } from '../errors';

const keywordList = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? '')
      .split(',')
      .map((k) => k.trim())
      .filter(Boolean)
  );

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NCBI_EUTILS_BASE_URL: z
    .string()
    .url()
    .default('https://eutils.ncbi.nlm.nih.gov/entrez/eutils'),
  NCBI_API_KEY: optionalString,
  NCBI_EMAIL: optionalString,
  NCBI_TOOL: z.string().min(1).default('pubmed-industry-papers'),
  PUBMED_DB: z.string().min(1).default('pubmed'),
  PUBMED_DEFAULT_MAX: z.coerce.number().int().min(0).default(20),
  // E-utilities accepts up to 200 ids per GET request.
  PUBMED_BATCH_SIZE: z.coerce.number().int().min(1).max(200).default(200),
  PUBMED_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  PUBMED_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  PUBMED_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(1),
  COMPANY_KEYWORDS: keywordList,
  ACADEMIC_KEYWORDS: keywordList,
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
});

export type AppConfig = {
  eutilsBaseUrl: string;
  apiKey?: string;
  email?: string;
  tool: string;
  database: string;
  defaultMaxResults: number;
  batchSize: number;
  timeoutMs: number;
  retries: number;
  fetchConcurrency: number;
  companyKeywords: string[];
  academicKeywords: string[];
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
};

/** Empty strings count as unset, so `FOO=` in a .env file falls back to the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;
  return {
    eutilsBaseUrl: e.NCBI_EUTILS_BASE_URL.replace(/\/+$/, ''),
    apiKey: e.NCBI_API_KEY,
    email: e.NCBI_EMAIL,
    tool: e.NCBI_TOOL,
    database: e.PUBMED_DB,
    defaultMaxResults: e.PUBMED_DEFAULT_MAX,
    batchSize: e.PUBMED_BATCH_SIZE,
    timeoutMs: e.PUBMED_TIMEOUT_MS,
    retries: e.PUBMED_RETRIES,
    fetchConcurrency: e.PUBMED_CONCURRENCY,
    companyKeywords: e.COMPANY_KEYWORDS,
    academicKeywords: e.ACADEMIC_KEYWORDS,
    logLevel: e.LOG_LEVEL,
  };
}
