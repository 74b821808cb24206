import chalk from 'chalk';
import { z } from 'zod';
import type { AnalysisResult, AppConfig, Category, Vocabulary } from './types';
import { errorMessage, extractJsonObject, JsonExtractionError } from './utils';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: 'OPENAI_API_KEY is not set' })
    .trim()
    .min(1, 'OPENAI_API_KEY is empty'),
  OPENAI_ENDPOINT: z
    .string({ required_error: 'OPENAI_ENDPOINT is not set' })
    .trim()
    .url('OPENAI_ENDPOINT must be a full URL'),
  OPENAI_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive('OPENAI_TIMEOUT_MS must be a positive number of milliseconds')
    .default(60_000),
  COMMIT_POLICY: z.enum(['full', 'minimal']).default('full'),
  COMMIT_UNTRACKED: z.enum(['stage', 'ignore']).default('stage'),
  COMMIT_STRICT_INPUT: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  COMMIT_PUSH_REMOTE: z.string().trim().min(1).optional(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return issue.message.includes(key) ? `  - ${issue.message}` : `  - ${key}: ${issue.message}`;
    });
    throw new ConfigError(
      `Invalid configuration. Export OPENAI_API_KEY and OPENAI_ENDPOINT before running.\n${problems.join('\n')}`
    );
  }

  const values = parsed.data;
  return {
    apiKey: values.OPENAI_API_KEY,
    endpoint: values.OPENAI_ENDPOINT,
    requestTimeoutMs: values.OPENAI_TIMEOUT_MS,
    policy: values.COMMIT_POLICY,
    untracked: values.COMMIT_UNTRACKED,
    strictInput: values.COMMIT_STRICT_INPUT,
    remote: values.COMMIT_PUSH_REMOTE,
  };
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

export async function openaiChat(
  config: AppConfig,
  messages: ChatMessage[],
  options: ChatOptions = {}
): Promise<string> {
  const body = {
    messages,
    temperature: options.temperature ?? 0.7,
    max_tokens: options.maxTokens ?? 800,
  };

  const res = await fetch(config.endpoint, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'api-key': config.apiKey,
    },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(config.requestTimeoutMs),
  });

  if (!res.ok) {
    const txt = await res.text();
    throw new Error(`Completion request failed (${res.status}): ${txt}`);
  }

  const parsed = ChatCompletionSchema.safeParse(await res.json());
  if (!parsed.success) throw new Error('No message in completion response');
  return parsed.data.choices[0].message.content.trim();
}

const SYSTEM_PROMPT =
  'You are a helpful assistant that analyzes git diffs and generates concise structured commit messages.';

export function buildAnalysisMessages(
  diff: string,
  category: Category | undefined,
  vocabulary: Vocabulary
): ChatMessage[] {
  const categoryHint = category ? `\nThe change type for this diff is **${category}**.\n` : '';

  const user = `Analyze the following git diff and generate a CONCISE commit message in the format [cpu][machine][type] title followed by details.
The cpu can be: ${vocabulary.cpus.join(', ')}
The machine can be: ${vocabulary.machines.join(', ')}
The type can be: ${vocabulary.types.join(', ')}
${categoryHint}
Requirements for the response:
1. Title should be brief but descriptive
2. Details should be limited to 2-3 key points maximum
3. Each detail should be short and focused
4. Avoid redundant information
5. Focus only on the most important changes

If any of cpu, machine, or type cannot be determined, set its value to "unknown".

The diff content is:

${diff}

Please return a JSON object in this format:
{
  "cpu": "detected_cpu",
  "machine": "detected_machine",
  "type": "change_type",
  "title": "brief_title",
  "details": ["key_point1", "key_point2"]
}`;

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: user },
  ];
}

const AnalysisSchema = z.object({
  cpu: z.string().catch(''),
  machine: z.string().catch(''),
  type: z.string().catch(''),
  title: z.string().trim().catch(''),
  details: z
    .array(z.string())
    .catch([])
    .transform((details) => details.map((d) => d.trim()).filter(Boolean)),
});

export function parseAnalysis(content: string): AnalysisResult {
  const parsed = AnalysisSchema.safeParse(extractJsonObject(content));
  if (!parsed.success) {
    throw new JsonExtractionError('Response JSON is not an object');
  }
  return parsed.data;
}

/**
 * Asks the completion service to describe `diff`. Any failure (HTTP status,
 * timeout, unparsable reply) is reported and turned into `null` so the caller
 * can skip the category.
 */
export async function analyzeDiff(
  config: AppConfig,
  diff: string,
  category: Category | undefined,
  vocabulary: Vocabulary
): Promise<AnalysisResult | null> {
  try {
    const content = await openaiChat(config, buildAnalysisMessages(diff, category, vocabulary));
    return parseAnalysis(content);
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      console.error(chalk.red(`Completion request timed out after ${config.requestTimeoutMs}ms`));
    } else if (err instanceof JsonExtractionError) {
      console.error(chalk.red(`Could not parse analysis: ${err.message}`));
    } else {
      console.error(chalk.red(`Analysis failed: ${errorMessage(err)}`));
    }
    return null;
  }
}
