import { randomUUID } from "node:crypto";
import { Request, Response, Router } from "express";
import { Logger, logContext } from "../config/logger";
import { normalizeConversationTurns } from "../conversation/conversation-turns";
import { isRecord } from "../extraction/candidate-profile.schema";
import { ModelExtractorResolver } from "../extraction/model-extractor.resolver";
import { PropertyScorer } from "../matching/property-scorer";
import { LeadQualifierService } from "../qualification/lead-qualifier.service";
import { SCENARIO_HEADER } from "../shared/constants";
import { MatchResult } from "../shared/types/catalog.types";
import { ConversationTurn } from "../shared/types/conversation.types";

interface RunsControllerDeps {
  leadQualifier: LeadQualifierService;
  propertyScorer: PropertyScorer;
  extractorResolver: ModelExtractorResolver;
  logger: Logger;
}

function readScenario(request: Request): string | undefined {
  const header = request.header(SCENARIO_HEADER)?.trim();
  return header ? header : undefined;
}

export function buildRunsController(deps: RunsControllerDeps): Router {
  const router = Router();

  router.post("/", async (request: Request, response: Response) => {
    const scenario = readScenario(request);
    const body: unknown = request.body ?? {};
    if (!isRecord(body)) {
      response.status(400).json({ ok: false, error: "Invalid body" });
      return;
    }

    let turns: ConversationTurn[];
    if (body.turns !== undefined) {
      const normalized = normalizeConversationTurns(body.turns);
      if (!normalized.ok) {
        response.status(400).json({ ok: false, error: normalized.error });
        return;
      }
      turns = normalized.turns;
    } else {
      turns = deps.extractorResolver.defaultTurns(scenario);
    }
    if (turns.length === 0) {
      response.status(400).json({ ok: false, error: "turns are required" });
      return;
    }

    const sessionId = randomUUID();
    const startedAt = Date.now();
    try {
      const qualified = await deps.leadQualifier.qualify(turns, {
        modelExtractor: deps.extractorResolver.resolve(scenario),
        sessionId,
      });
      const matches: MatchResult[] = qualified.profile.city
        ? await deps.propertyScorer.call(qualified.profile)
        : [];

      logContext(deps.logger, "info", "run.completed", {
        session_id: sessionId,
        scenario,
        route: "/run",
        latency_ms: Date.now() - startedAt,
        ok: true,
      }, { matchCount: matches.length });

      response.status(200).json({
        session_id: sessionId,
        lead_profile: qualified.profile,
        matches,
        needs_human_review: qualified.needs_review,
        discrepancies: qualified.discrepancies,
        metrics: {
          qualification_duration_ms: qualified.duration_ms,
          turns_count: turns.length,
        },
        status: qualified.status,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      logContext(deps.logger, "error", "run.failed", {
        session_id: sessionId,
        scenario,
        route: "/run",
        latency_ms: Date.now() - startedAt,
        ok: false,
        error_code: "run_failed",
      }, { error: message });
      response.status(500).json({ error: "run_failed", message });
    }
  });

  return router;
}
