// API layer: Encounter routes
// Create encounters, submit intents, pull views and events

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import { EncounterState } from '@/domain/combat/types.js';
import { EncounterEngine, type StepResult } from '@/application/combat/EncounterEngine.js';
import {
  CombatantDefinitionSchema,
  DiceOptionsSchema,
  EngineConfigSchema,
  parseIntent,
} from '@/application/combat/schemas.js';
import { serializeChoice, serializeEvents } from '@/application/combat/EventSerializer.js';
import { createDiceService } from '@/infrastructure/game/DiceService.js';
import type { IEncounterRegistry } from '@/infrastructure/encounter/EncounterRegistry.js';
import type { EngineConfig } from '@/utils/config.js';
import { apiLogger, engineLogger, type Logger } from '@/utils/logger.js';

// ========== Schemas ==========

const CreateEncounterSchema = z.object({
  party: z.array(CombatantDefinitionSchema).min(1),
  opposition: z.array(CombatantDefinitionSchema).min(1),
  dice: DiceOptionsSchema.default({ mode: 'random' }),
  config: EngineConfigSchema.default({}),
});

const SubmitIntentSchema = z.object({
  intent: z.unknown(),
});

const EventsQuerySchema = z.object({
  since: z.coerce.number().int().min(0).default(0),
});

// ========== Helpers ==========

function decisionPayload(engine: EncounterEngine, result?: StepResult) {
  const needsIntent = result?.needsIntent ?? engine.needsIntent;
  return {
    state: engine.state,
    outcome: engine.outcome,
    needsIntent,
    pendingCombatantId: needsIntent ? engine.currentCombatantId : null,
    choices: needsIntent ? engine.pendingChoices.map(serializeChoice) : [],
  };
}

export interface EncounterRouterOptions {
  engineConfig: EngineConfig;
  engineLogger?: Logger;
}

// ========== Routes ==========

export function createEncounterRouter(registry: IEncounterRegistry, options: EncounterRouterOptions): Router {
  const router = Router();
  const logger = options.engineLogger ?? engineLogger;

  // Create an encounter and run it to the first decision point
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = CreateEncounterSchema.parse(req.body);
      const defaults = options.engineConfig;

      const engine = new EncounterEngine({
        party: body.party,
        opposition: body.opposition,
        dice: createDiceService(body.dice),
        config: {
          maxSteps: body.config.maxSteps ?? defaults.maxSteps,
          turnOrder: body.config.turnOrder ?? defaults.turnOrder,
          initiativeDie: body.config.initiativeDie ?? defaults.initiativeDie,
          moraleDie: body.config.moraleDie ?? defaults.moraleDie,
          surprise: body.config.surprise ?? defaults.surprise,
        },
        logger,
      });
      registry.add(engine);
      apiLogger.info('Encounter created', {
        encounterId: engine.encounterId,
        diceMode: body.dice.mode,
        active: registry.activeCount,
      });

      const result = engine.stepUntilDecision();

      res.status(201).json({
        success: true,
        encounterId: engine.encounterId,
        ...decisionPayload(engine, result),
        view: engine.getView(),
        events: serializeEvents(result.events),
      });
    })
  );

  // List active encounter ids
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({
        success: true,
        encounters: registry.list(),
      });
    })
  );

  // Current view
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const engine = registry.require(req.params.id);
      res.json({
        success: true,
        ...decisionPayload(engine),
        view: engine.getView(),
      });
    })
  );

  // Events since an index
  router.get(
    '/:id/events',
    asyncHandler(async (req: Request, res: Response) => {
      const engine = registry.require(req.params.id);
      const { since } = EventsQuerySchema.parse(req.query);
      const events = engine.getEvents(since);

      res.json({
        success: true,
        events: serializeEvents(events),
        next: Math.max(since, engine.eventCount),
      });
    })
  );

  // Submit the pending combatant's intent
  router.post(
    '/:id/intents',
    asyncHandler(async (req: Request, res: Response) => {
      const engine = registry.require(req.params.id);
      const { intent: rawIntent } = SubmitIntentSchema.parse(req.body);
      const intent = parseIntent(rawIntent);

      if (engine.state === EncounterState.ENDED) {
        throw createError('Encounter has already ended', 409, 'ENCOUNTER_ENDED', {
          encounterId: engine.encounterId,
          outcome: engine.outcome,
        });
      }

      const result = engine.stepUntilDecision(intent);

      res.json({
        success: true,
        ...decisionPayload(engine, result),
        view: engine.getView(),
        events: serializeEvents(result.events),
      });
    })
  );

  // Abandon an encounter
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const engine = registry.require(req.params.id);
      registry.remove(engine.encounterId);
      apiLogger.info('Encounter abandoned', { encounterId: engine.encounterId, state: engine.state });
      res.status(204).end();
    })
  );

  return router;
}
