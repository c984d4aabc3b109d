import { Router } from "express";
import { z } from "zod";
import { ValidationError } from "../../errors/AppError";
import { safeHandler } from "../../middleware/safeHandler";
import type { RulesService } from "./rules.service";

const querySchema = z.object({
  question: z.string(),
  k: z.number().int().optional(),
  answer: z.boolean().optional(),
});

export function createRulesRouter(rules: RulesService): Router {
  const router = Router();

  router.post(
    "/query",
    safeHandler(async (req, res) => {
      const parsed = querySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError(
          "Invalid rule query.",
          parsed.error.issues.map((issue) => ({
            field: issue.path.join(".") || "body",
            message: issue.message,
          }))
        );
      }
      const { question, k } = parsed.data;
      if (parsed.data.answer) {
        const answered = await rules.answerQuestion(question, k);
        res.json({ question, results: answered.results, answer: answered.answer });
        return;
      }
      const results = await rules.queryRules(question, k);
      res.json({ question, results });
    })
  );

  router.post(
    "/rebuild",
    safeHandler(async (_req, res) => {
      const status = await rules.rebuild();
      res.json(status);
    })
  );

  router.get("/status", (_req, res) => {
    res.json(rules.status());
  });

  return router;
}
