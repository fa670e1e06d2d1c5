import { Router, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { getEnv } from "../config/env.js";
import { AppError, asyncHandler } from "../middleware/error.js";
import { createRecommendRateLimiter } from "../middleware/rateLimit.js";
import type { RecommendationService } from "../services/recommendationService.js";
import { OcrError, type TextExtractor, type TextExtractorProvider } from "../services/textExtractor.js";
import type { Recommendation, RecommendationPayload, RecommendResponse } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "recommend-route" });

const MAX_RECEIPT_LINES = 1_000;

const recommendRequestSchema = z.object({
  receipt_lines: z.array(z.string().max(1_000)).max(MAX_RECEIPT_LINES),
});

export type RecommendRouterDependencies = {
  service: RecommendationService;
  textExtractor: TextExtractorProvider;
};

type ReceiptLines = {
  lines: string[];
  ocrLines?: string[];
};

export function createRecommendRouter(deps: RecommendRouterDependencies) {
  const env = getEnv();
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: env.UPLOAD_MAX_BYTES, files: 1 },
  });

  router.post(
    "/recommend",
    createRecommendRateLimiter(),
    upload.single("image"),
    asyncHandler(async (req, res) => {
      const source = await readReceiptLines(req, res, deps.textExtractor);
      const result = await deps.service.recommendFromLines(source.lines);

      const body: RecommendResponse = {
        status: "success",
        standard_materials: result.standardMaterials,
        recommendations: result.recommendations.map(toRecommendationPayload),
      };
      if (source.ocrLines) {
        body.ocr_lines = source.ocrLines;
      }
      res.json(body);
    })
  );

  return router;
}

async function readReceiptLines(req: Request, res: Response, provider: TextExtractorProvider): Promise<ReceiptLines> {
  if (req.file) {
    if (req.file.size === 0) {
      throw new AppError("Uploaded image is empty", 400, "empty_upload");
    }

    const extractor = resolveExtractor(provider);
    const lines = await extractText(extractor, req.file.buffer, res);
    if (lines.length === 0) {
      throw new AppError("No text was detected in the image", 400, "empty_ocr_result");
    }

    log.info({ msg: "OCR completed", provider: extractor.provider, lines });
    return { lines, ocrLines: lines };
  }

  if (isRecord(req.body) && "receipt_lines" in req.body) {
    const parsed = recommendRequestSchema.parse(req.body);
    return { lines: parsed.receipt_lines };
  }

  throw new AppError("Provide receipt_lines or an image file", 400, "missing_payload");
}

function resolveExtractor(provider: TextExtractorProvider): TextExtractor {
  let extractor: TextExtractor | null;
  try {
    extractor = provider();
  } catch (error) {
    log.error({
      msg: "Text extractor initialization failed",
      error: error instanceof Error ? error.message : String(error),
    });
    throw new AppError("Image text extraction is not configured on this server", 503, "ocr_unavailable");
  }

  if (!extractor) {
    throw new AppError("Image text extraction is disabled", 503, "ocr_unavailable");
  }
  return extractor;
}

async function extractText(extractor: TextExtractor, image: Buffer, res: Response): Promise<string[]> {
  const controller = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  };
  res.on("close", onClose);

  try {
    return await extractor.extractLines(image, { signal: controller.signal });
  } catch (error) {
    if (error instanceof OcrError) {
      throw toAppError(error);
    }
    throw error;
  } finally {
    res.off("close", onClose);
  }
}

function toAppError(error: OcrError): AppError {
  switch (error.code) {
    case "unavailable":
      return new AppError("Image text extraction is not configured on this server", 503, "ocr_unavailable");
    case "timeout":
      return new AppError("Text extraction timed out", 504, "ocr_timeout");
    case "auth_failed":
      return new AppError("Text extraction service rejected the server credentials", 502, "ocr_auth_failed");
    case "upstream_error":
    case "invalid_response":
      return new AppError(`Text extraction failed: ${error.message}`, 502, "ocr_failed");
  }
}

export function toRecommendationPayload(item: Recommendation): RecommendationPayload {
  const payload: RecommendationPayload = {
    name: item.name,
    match_ratio: item.matchRatio,
    matched: item.matchedMaterials,
    missing: item.missingMaterials,
    missing_count: item.missingCount,
  };
  if (item.imageURL) {
    payload.image_url = item.imageURL;
  }
  if (item.steps) {
    payload.steps = item.steps;
  }
  return payload;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
