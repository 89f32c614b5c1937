import { z } from "zod";
import { logger, logPlainOutput } from "../config/logger.js";
import type { VllmWorkload } from "../provisioning/target-config-schema.js";
import { describeFailure, type RuntimeClient } from "../runtime/runtime-client.js";

export const CHAT_COMPLETIONS_PATH = "/v1/chat/completions";

const CHAT_TIMEOUT_SECONDS = 120;

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
});

export function chatCompletionRequest(workload: VllmWorkload, prompt: string, maxTokens: number): string {
  return JSON.stringify({
    model: workload.servedModelName ?? workload.model,
    messages: [{ role: "user", content: prompt }],
    max_tokens: maxTokens,
  });
}

/** First choice's content, or null when the body is not a chat completion. */
export function parseChatReply(body: string): string | null {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }
  const parsed = chatCompletionSchema.safeParse(json);
  if (!parsed.success) return null;
  return parsed.data.choices[0]?.message.content ?? "";
}

/**
 * POST one chat completion from inside the container and log the reply.
 * Every failure is a warning; the health check has already passed.
 */
export async function checkChatCompletion(runtime: RuntimeClient, ctid: number, workload: VllmWorkload): Promise<void> {
  const check = workload.apiCheck;
  if (!check) return;

  const url = `http://localhost:${workload.port}${CHAT_COMPLETIONS_PATH}`;
  logger.info("Sending chat completion", { ctid, url });
  const result = await runtime.exec(ctid, [
    "curl",
    "-s",
    "--max-time",
    String(CHAT_TIMEOUT_SECONDS),
    "-X",
    "POST",
    url,
    "-H",
    "Content-Type: application/json",
    "-d",
    chatCompletionRequest(workload, check.prompt, check.maxTokens),
  ]);
  if (result.exitCode !== 0) {
    logger.warn("Chat completion request failed", { ctid, url, exitCode: result.exitCode, error: describeFailure(result) });
    return;
  }

  const reply = parseChatReply(result.stdout);
  if (reply === null) {
    logger.warn("Chat completion response is not a chat completion", { ctid, url });
    logPlainOutput("error", result.stdout);
    return;
  }
  logger.info("Model reply", { ctid });
  logPlainOutput("info", reply);

  if (check.expect && !reply.toLowerCase().includes(check.expect.toLowerCase())) {
    logger.warn("Model reply does not contain the expected text", { ctid, expected: check.expect });
    return;
  }
  logger.info("Chat completion check passed", { ctid, url });
}
