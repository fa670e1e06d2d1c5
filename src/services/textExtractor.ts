import type { Env } from "../config/env.js";

export class OcrError extends Error {
  constructor(
    message: string,
    readonly code:
      | "unavailable"
      | "timeout"
      | "auth_failed"
      | "upstream_error"
      | "invalid_response"
  ) {
    super(message);
    this.name = "OcrError";
  }
}

export type ExtractOptions = {
  signal?: AbortSignal;
};

/** Turns an uploaded receipt image into raw text lines. */
export interface TextExtractor {
  readonly provider: string;
  extractLines(image: Buffer, options?: ExtractOptions): Promise<string[]>;
}

export type OcrSettings = Pick<Env, "OCR_PROVIDER" | "GOOGLE_VISION_API_KEY" | "GOOGLE_VISION_API_URL" | "OCR_TIMEOUT_MS">;

type FetchLike = (input: RequestInfo | URL, init?: RequestInit) => Promise<Response>;

export type GoogleVisionOptions = {
  apiKey: string;
  apiURL: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
};

/**
 * Google Cloud Vision TEXT_DETECTION over the REST `images:annotate` endpoint.
 * The first text annotation holds the whole detected text.
 */
export class GoogleVisionTextExtractor implements TextExtractor {
  readonly provider = "google_vision";

  private readonly endpoint: URL;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GoogleVisionOptions) {
    const apiKey = options.apiKey.trim();
    if (!apiKey) {
      throw new OcrError("Google Vision API key is empty", "unavailable");
    }

    this.endpoint = new URL(options.apiURL);
    this.endpoint.searchParams.set("key", apiKey);
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async extractLines(image: Buffer, options: ExtractOptions = {}): Promise<string[]> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    let payload: unknown;
    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        signal: controller.signal,
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: JSON.stringify({
          requests: [
            {
              image: { content: image.toString("base64") },
              features: [{ type: "TEXT_DETECTION" }]
            }
          ]
        })
      });

      if (response.status === 401 || response.status === 403) {
        throw new OcrError(`Vision API rejected credentials (${response.status})`, "auth_failed");
      }
      if (!response.ok) {
        throw new OcrError(`Vision API responded with ${response.status}`, "upstream_error");
      }

      payload = await response.json();
    } catch (error) {
      if (error instanceof OcrError) {
        throw error;
      }
      if (isAbortError(error)) {
        throw new OcrError("Vision API request timed out", "timeout");
      }
      throw new OcrError(`Vision API request failed: ${errorMessage(error)}`, "upstream_error");
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener("abort", onAbort);
    }

    return splitLines(parseAnnotateResponse(payload));
  }
}

export function parseAnnotateResponse(payload: unknown): string {
  if (!isRecord(payload) || !Array.isArray(payload.responses)) {
    throw new OcrError("Vision API returned an unexpected payload", "invalid_response");
  }

  const first: unknown = payload.responses[0];
  if (!isRecord(first)) {
    return "";
  }

  if (isRecord(first.error) && typeof first.error.message === "string" && first.error.message) {
    throw new OcrError(`Vision API error: ${first.error.message}`, "upstream_error");
  }

  if (Array.isArray(first.textAnnotations)) {
    const annotation: unknown = first.textAnnotations[0];
    if (isRecord(annotation) && typeof annotation.description === "string") {
      return annotation.description;
    }
  }

  if (isRecord(first.fullTextAnnotation) && typeof first.fullTextAnnotation.text === "string") {
    return first.fullTextAnnotation.text;
  }

  return "";
}

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Returns the configured extractor, or null when OCR is switched off.
 * Throws OcrError("unavailable") when the provider is selected but cannot be set up.
 */
export function createTextExtractor(env: OcrSettings): TextExtractor | null {
  if (env.OCR_PROVIDER === "disabled") {
    return null;
  }

  if (!env.GOOGLE_VISION_API_KEY) {
    throw new OcrError("GOOGLE_VISION_API_KEY is not set", "unavailable");
  }

  return new GoogleVisionTextExtractor({
    apiKey: env.GOOGLE_VISION_API_KEY,
    apiURL: env.GOOGLE_VISION_API_URL,
    timeoutMs: env.OCR_TIMEOUT_MS
  });
}

export type TextExtractorProvider = () => TextExtractor | null;

/**
 * Defers extractor setup to the first image request. A failed setup is retried
 * on the next call; a successful one is reused.
 */
export function lazyTextExtractor(env: OcrSettings): TextExtractorProvider {
  let extractor: TextExtractor | null | undefined;
  return () => {
    if (extractor === undefined) {
      extractor = createTextExtractor(env);
    }
    return extractor;
  };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
