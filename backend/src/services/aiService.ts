import Anthropic from "@anthropic-ai/sdk";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import { FixGenerationError } from "../errors.js";
import { Fix } from "../types.js";
import { isWellFormedFix } from "./fixApplier.js";

export type Provider = "anthropic" | "gemini";

export interface FixGenerator {
  generateFixes(documentText: string): Promise<Fix[]>;
}

type GeneratorOptions = {
  provider: Provider;
  apiKey: string;
  model?: string;
  maxContentChars?: number;
  /** Per-request timeout for the provider call. */
  timeoutMs?: number;
};

const MAX_FIXES = 50;

const responseSchema = z.object({
  fixes: z
    .array(
      z.object({
        search: z.string(),
        replace: z.string()
      })
    )
    .max(200)
});

function resolveDefaultModel(provider: Provider): string {
  return provider === "anthropic" ? "claude-3-5-sonnet-latest" : "gemini-1.5-pro";
}

export function trimContent(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n\n[Truncated for token safety]`;
}

function buildPrompt(documentText: string): string {
  return [
    "You are a strict proofreading assistant.",
    "Find spelling, grammar and punctuation mistakes in the document below.",
    "Each fix replaces an exact substring of the document with its corrected form.",
    "The search text must be copied verbatim from the document and be long enough to be unambiguous.",
    "Do not rewrite sentences or change meaning.",
    "Output JSON only, with this exact format:",
    '{"fixes":[{"search":"...","replace":"..."}]}',
    'If there is nothing to fix, output {"fixes":[]}.',
    "",
    "Document:",
    documentText
  ].join("\n");
}

export function extractJsonPayload(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    return trimmed;
  }

  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch?.[1]) {
    return fenceMatch[1].trim();
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return trimmed.slice(start, end + 1);
  }

  throw new FixGenerationError("Model response did not contain JSON.", "Could not process the analysis. Please try again.");
}

/** Parses a model reply into well-formed, de-duplicated fixes. */
export function parseFixResponse(raw: string): Fix[] {
  let payload: unknown;
  try {
    payload = JSON.parse(extractJsonPayload(raw));
  } catch (error) {
    if (error instanceof FixGenerationError) {
      throw error;
    }
    throw new FixGenerationError("Model response JSON is invalid.", "Could not process the analysis. Please try again.");
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new FixGenerationError("Model response does not match the fix schema.", "Could not process the analysis. Please try again.");
  }

  const seen = new Set<string>();
  const fixes: Fix[] = [];
  for (const fix of parsed.data.fixes) {
    const key = `${fix.search}\u0000${fix.replace}`;
    if (!isWellFormedFix(fix) || seen.has(key)) {
      continue;
    }
    seen.add(key);
    fixes.push({ search: fix.search, replace: fix.replace });
  }
  return fixes.slice(0, MAX_FIXES);
}

async function runAnthropic(prompt: string, model: string, apiKey: string, timeoutMs: number): Promise<string> {
  const client = new Anthropic({ apiKey, timeout: timeoutMs });
  const response = await client.messages.create({
    model,
    max_tokens: 2500,
    temperature: 0.2,
    messages: [
      {
        role: "user",
        content: prompt
      }
    ]
  });

  return response.content.flatMap((item) => (item.type === "text" ? [item.text] : [])).join("\n");
}

async function runGemini(prompt: string, model: string, apiKey: string, timeoutMs: number): Promise<string> {
  const client = new GoogleGenerativeAI(apiKey);
  const modelApi = client.getGenerativeModel({ model }, { timeout: timeoutMs });
  const response = await modelApi.generateContent(prompt);
  return response.response.text();
}

export function createFixGenerator(options: GeneratorOptions): FixGenerator {
  const model = options.model || resolveDefaultModel(options.provider);
  const maxContentChars = options.maxContentChars ?? 15_000;
  const timeoutMs = options.timeoutMs ?? 120_000;

  return {
    async generateFixes(documentText: string): Promise<Fix[]> {
      const prompt = buildPrompt(trimContent(documentText, maxContentChars));
      let rawResponse: string;
      try {
        rawResponse =
          options.provider === "anthropic"
            ? await runAnthropic(prompt, model, options.apiKey, timeoutMs)
            : await runGemini(prompt, model, options.apiKey, timeoutMs);
      } catch (error) {
        throw new FixGenerationError(
          `${options.provider} request failed: ${error instanceof Error ? error.message : String(error)}`
        );
      }
      return parseFixResponse(rawResponse);
    }
  };
}
