// ─────────────────────────────────────────────────────────────
// Text Generator — OpenAI Responses API over HTTPS
//
// One POST per call. No retries: a network or API failure
// surfaces as ExternalServiceFailure to the command.
// ─────────────────────────────────────────────────────────────

import http from "http";
import https from "https";
import type { GenerationConfig } from "../config/cliConfig";
import { DocCliError } from "../access/accessErrors";
import { logEvent } from "../config/log";

/** Text generation capability handed to commands */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export class OpenAIResponsesClient implements TextGenerator {
  private readonly config: GenerationConfig;

  constructor(config: GenerationConfig) {
    this.config = config;
  }

  async generate(prompt: string): Promise<string> {
    if (!this.config.apiKey) {
      throw new DocCliError(
        "ExternalServiceFailure",
        "OPENAI_API_KEY is not set. Export it to use summarize or quiz."
      );
    }

    const requestBody = JSON.stringify({ model: this.config.model, input: prompt });
    logEvent("GENERATE", `POST ${this.config.apiUrl} (${this.config.model}, ${prompt.length} chars)`);

    const { statusCode, body } = await postJSON(this.config.apiUrl, this.config.apiKey, requestBody);

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new DocCliError(
        "ExternalServiceFailure",
        `Generation service returned a non-JSON response (HTTP ${statusCode})`
      );
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new DocCliError(
        "ExternalServiceFailure",
        `Generation service error (HTTP ${statusCode}): ${extractErrorMessage(parsed) ?? "unknown error"}`
      );
    }

    const text = extractOutputText(parsed);
    if (text === null) {
      throw new DocCliError("ExternalServiceFailure", "Generation service returned no text output");
    }
    return text;
  }
}

// ── HTTP ─────────────────────────────────────────────────────

function postJSON(
  apiUrl: string,
  apiKey: string,
  requestBody: string
): Promise<{ statusCode: number; body: string }> {
  return new Promise((resolve, reject) => {
    const url = new URL(apiUrl);
    const options: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (url.protocol === "https:" ? 443 : 80),
      path: `${url.pathname}${url.search}`,
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "Authorization": `Bearer ${apiKey}`,
        "Content-Length": Buffer.byteLength(requestBody),
      },
    };

    const onResponse = (res: http.IncomingMessage) => {
      let data = "";
      res.setEncoding("utf-8");
      res.on("data", (chunk: string) => { data += chunk; });
      res.on("end", () => resolve({ statusCode: res.statusCode ?? 0, body: data }));
      res.on("error", (err: Error) => reject(serviceFailure(err)));
    };
    const req =
      url.protocol === "https:" ? https.request(options, onResponse) : http.request(options, onResponse);

    req.on("error", (err: Error) => reject(serviceFailure(err)));
    req.write(requestBody);
    req.end();
  });
}

function serviceFailure(err: Error): DocCliError {
  return new DocCliError("ExternalServiceFailure", `Generation service unreachable: ${err.message}`, {
    cause: err,
  });
}

// ── Response Parsing ─────────────────────────────────────────

/**
 * Concatenate every `output_text` part of a Responses API payload.
 * Prefers the top-level `output_text` convenience field when present.
 */
export function extractOutputText(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null) return null;

  if ("output_text" in payload && typeof payload.output_text === "string") {
    return payload.output_text;
  }
  if (!("output" in payload) || !Array.isArray(payload.output)) return null;

  const output: unknown[] = payload.output;
  const parts: string[] = [];
  for (const item of output) {
    if (typeof item !== "object" || item === null) continue;
    if (!("content" in item) || !Array.isArray(item.content)) continue;
    const contents: unknown[] = item.content;
    for (const content of contents) {
      if (
        typeof content === "object" &&
        content !== null &&
        "type" in content &&
        content.type === "output_text" &&
        "text" in content &&
        typeof content.text === "string"
      ) {
        parts.push(content.text);
      }
    }
  }
  return parts.length > 0 ? parts.join("") : null;
}

function extractErrorMessage(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("error" in payload)) return null;
  const error: unknown = payload.error;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return null;
}
