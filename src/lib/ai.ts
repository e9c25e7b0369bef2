/**
 * DeepSeek classifier for commit descriptors
 *
 * Talks to any OpenAI-compatible chat completion endpoint; DeepSeek is the
 * default. The reply must be a JSON object with type, scope, theme and intro.
 */

import OpenAI from "openai";
import { z } from "zod";
import { sanitizeScope, countChanges } from "./classifier";
import { AiClassificationError, getErrorMessage } from "./errors";
import { COMMIT_TYPES, type AiSettings, type ChangeSet, type CommitDescriptor } from "../types/commit";

const MAX_PROMPT_FILES = 30;
const MAX_PROMPT_DIFF_CHARS = 12000;

export interface CompletionRequest {
  system: string;
  user: string;
}

/**
 * Sends one chat completion and resolves with the raw message content
 */
export type CompletionRequester = (request: CompletionRequest) => Promise<string>;

const SYSTEM_PROMPT = [
  "你是资深代码审阅助手。根据 git diff 生成 commit 四要素。",
  "必须返回严格 JSON，不要 markdown，不要解释。",
  "字段: type, scope, theme, intro。",
  `type 必须是 ${COMMIT_TYPES.join("/")} 之一。`,
  "theme 和 intro 必须是简洁中文。",
].join("");

const aiDescriptorSchema = z.object({
  type: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(COMMIT_TYPES)),
  scope: z.string().optional(),
  // The theme ends up in the one-line header
  theme: z
    .string()
    .trim()
    .min(1, "theme is empty")
    .transform((value) => value.replace(/\s+/g, " ")),
  intro: z.string().trim().min(1, "intro is empty"),
});

export function buildPrompt(repoPath: string, changeSet: ChangeSet): CompletionRequest {
  const payload = {
    repo: repoPath,
    changed_files: changeSet.paths.slice(0, MAX_PROMPT_FILES),
    change_counts: countChanges(changeSet.changes),
    diff: changeSet.diff.slice(0, MAX_PROMPT_DIFF_CHARS),
    output_schema: {
      type: COMMIT_TYPES.join("|"),
      scope: "string",
      theme: "string",
      intro: "string",
    },
  };

  return { system: SYSTEM_PROMPT, user: JSON.stringify(payload) };
}

/**
 * Validate the model's reply and turn it into a descriptor
 */
export function parseAiResponse(raw: string): CommitDescriptor {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new AiClassificationError(`AI returned non-JSON content: ${getErrorMessage(error)}`);
  }

  const parsed = aiDescriptorSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AiClassificationError(`AI returned invalid descriptor: ${details}`);
  }

  const { type, scope, theme, intro } = parsed.data;
  return {
    type,
    scope: sanitizeScope(scope?.trim() ?? ""),
    theme,
    intro,
  };
}

/**
 * Requester backed by the `openai` client pointed at `settings.baseUrl`
 */
export function createDeepSeekRequester(settings: AiSettings): CompletionRequester {
  if (!settings.apiKey) {
    throw new AiClassificationError("DEEPSEEK_API_KEY is not set");
  }

  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutSeconds * 1000,
    maxRetries: 0,
  });

  return async ({ system, user }) => {
    const completion = await client.chat.completions.create({
      model: settings.model,
      temperature: 0.1,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      response_format: { type: "json_object" },
    });

    const choice = completion.choices[0];
    if (!choice) {
      throw new AiClassificationError("DeepSeek returned empty choices");
    }
    if (!choice.message.content) {
      throw new AiClassificationError("DeepSeek returned empty content");
    }
    return choice.message.content;
  };
}

export async function classifyWithAi(
  repoPath: string,
  changeSet: ChangeSet,
  request: CompletionRequester
): Promise<CommitDescriptor> {
  let raw: string;
  try {
    raw = await request(buildPrompt(repoPath, changeSet));
  } catch (error) {
    if (error instanceof AiClassificationError) throw error;
    throw new AiClassificationError(`DeepSeek request failed: ${getErrorMessage(error)}`);
  }
  return parseAiResponse(raw);
}
