import { Router, type Request } from "express";
import rateLimit from "express-rate-limit";
import multer from "multer";
import { z } from "zod";
import { getMaxUploadBytes, getSubmitRateLimitMax, getSubmitRateLimitWindowMs } from "../../config";
import { ValidationError } from "../../errors/AppError";
import { safeHandler } from "../../middleware/safeHandler";
import type { WorkflowOrchestrator } from "../workflow/workflowOrchestrator";
import type { UploadedFile } from "./application.types";

const MAX_FILES = 20;

const submitFieldsSchema = z.object({
  applicant_id: z.string().optional().default(""),
  target_program: z.string().optional().default(""),
  entity: z.string().optional(),
});

function readUploadedFiles(files: Request["files"]): UploadedFile[] {
  if (!Array.isArray(files)) {
    return [];
  }
  return files.map((file) => ({
    fileName: file.originalname,
    mimeType: file.mimetype,
    buffer: file.buffer,
  }));
}

export function createApplicationsRouter(orchestrator: WorkflowOrchestrator): Router {
  const router = Router();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: getMaxUploadBytes(), files: MAX_FILES },
  });

  const submitLimiter = rateLimit({
    windowMs: getSubmitRateLimitWindowMs(),
    max: getSubmitRateLimitMax(),
    standardHeaders: true,
    legacyHeaders: false,
    message: { ok: false, error: "rate_limited", message: "Too many submissions." },
  });

  router.post(
    "/",
    submitLimiter,
    upload.array("files", MAX_FILES),
    safeHandler(async (req, res) => {
      const parsed = submitFieldsSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError("Invalid submission fields.", [
          { field: parsed.error.issues[0]?.path.join(".") || "body", message: "must be a string" },
        ]);
      }
      const fields = parsed.data;
      const result = await orchestrator.submit({
        applicantId: fields.applicant_id,
        targetProgram: fields.target_program,
        entity: fields.entity,
        files: readUploadedFiles(req.files),
      });
      res.status(202).json(result);
    })
  );

  router.get(
    "/",
    safeHandler(async (_req, res) => {
      const applications = await orchestrator.listApplications();
      res.json({ applications });
    })
  );

  router.get(
    "/:id",
    safeHandler(async (req, res) => {
      const status = await orchestrator.getStatus(req.params.id ?? "");
      res.json(status);
    })
  );

  return router;
}
