// Application layer: Encounter engine
// Deterministic turn-based state machine; one step = one state transition

import { v4 as uuidv4 } from 'uuid';
import {
  CombatSide,
  EncounterOutcome,
  EncounterState,
  type CombatantDefinition,
} from '@/domain/combat/types.js';
import type { DiceService } from '@/domain/combat/dice.js';
import type { Effect } from '@/domain/combat/effects.js';
import type { ActionChoice, EncounterEvent } from '@/domain/combat/events.js';
import type { ActionIntent } from '@/domain/combat/intents.js';
import type { TacticalProvider } from '@/domain/combat/tactics.js';
import type { CombatView } from '@/domain/combat/views.js';
import { CombatContext, type Combatant } from '@/application/combat/CombatContext.js';
import { CombatantDefinitionSchema, type CombatantInput } from '@/application/combat/schemas.js';
import { computeChoices } from '@/application/combat/choices.js';
import { resolveIntent, validateIntent } from '@/application/combat/actions.js';
import { applyEffect } from '@/application/combat/applyEffect.js';
import { checkMorale } from '@/application/combat/morale.js';
import { RandomTacticalProvider } from '@/application/combat/TacticalProviders.js';
import { buildCombatView } from '@/application/combat/views.js';
import { parseDiceNotation, RandomDiceService } from '@/infrastructure/game/DiceService.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '@/utils/config.js';
import { EncounterConfigError, EncounterLoopError, EncounterUsageError } from '@/utils/errors.js';
import { deepFreeze } from '@/utils/freeze.js';
import { silentLogger, type Logger } from '@/utils/logger.js';

export interface EncounterEngineOptions {
  party: readonly CombatantInput[];
  opposition: readonly CombatantInput[];
  /** Defaults to a RandomDiceService */
  dice?: DiceService;
  /** Providers keyed by combatant id */
  providers?: Readonly<Record<string, TacticalProvider>>;
  /** Used for AI combatants without their own provider; random over `dice` by default */
  defaultProvider?: TacticalProvider;
  config?: Partial<EngineConfig>;
  encounterId?: string;
  logger?: Logger;
}

export interface StepResult {
  state: EncounterState;
  /** True when the engine is suspended waiting for an external intent */
  needsIntent: boolean;
  pendingCombatantId: string | null;
  /** Events emitted during this call, in order */
  events: readonly EncounterEvent[];
}

type ActiveState = Exclude<EncounterState, typeof EncounterState.ENDED>;

const SURPRISE_DIE = '1d6';

function parseDefinitions(inputs: readonly CombatantInput[], side: CombatSide): CombatantDefinition[] {
  return inputs.map((input, index) => {
    const parsed = CombatantDefinitionSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new EncounterConfigError(`Invalid combatant definition (${side} #${index}): ${issues.join('; ')}`, {
        side,
        index,
      });
    }
    return parsed.data;
  });
}

function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = {
    maxSteps: overrides.maxSteps ?? DEFAULT_ENGINE_CONFIG.maxSteps,
    turnOrder: overrides.turnOrder ?? DEFAULT_ENGINE_CONFIG.turnOrder,
    initiativeDie: overrides.initiativeDie ?? DEFAULT_ENGINE_CONFIG.initiativeDie,
    moraleDie: overrides.moraleDie ?? DEFAULT_ENGINE_CONFIG.moraleDie,
    surprise: overrides.surprise ?? DEFAULT_ENGINE_CONFIG.surprise,
  };
  if (!Number.isInteger(config.maxSteps) || config.maxSteps < 1) {
    throw new EncounterConfigError('maxSteps must be a positive integer', { maxSteps: config.maxSteps });
  }
  // Fails with DiceFormatError on bad notation
  parseDiceNotation(config.initiativeDie);
  parseDiceNotation(config.moraleDie);
  return config;
}

export class EncounterEngine {
  readonly encounterId: string;
  readonly config: Readonly<EngineConfig>;

  private context: CombatContext;
  private dice: DiceService;
  private providers: ReadonlyMap<string, TacticalProvider>;
  private defaultProvider: TacticalProvider;
  private logger: Logger;

  private currentState: EncounterState = EncounterState.INIT;
  private currentOutcome: EncounterOutcome | null = null;
  private pendingIntent: ActionIntent | null = null;
  private choices: readonly ActionChoice[] = [];
  private log: EncounterEvent[] = [];

  private readonly handlers: Record<ActiveState, () => void> = {
    [EncounterState.INIT]: () => this.handleInit(),
    [EncounterState.ROUND_START]: () => this.handleRoundStart(),
    [EncounterState.TURN_START]: () => this.handleTurnStart(),
    [EncounterState.AWAIT_INTENT]: () => this.handleAwaitIntent(),
    [EncounterState.VALIDATE_INTENT]: () => this.handleValidateIntent(),
    [EncounterState.EXECUTE_ACTION]: () => this.handleExecuteAction(),
    [EncounterState.CHECK_DEATHS]: () => this.handleCheckDeaths(),
    [EncounterState.CHECK_MORALE]: () => this.handleCheckMorale(),
    [EncounterState.CHECK_VICTORY]: () => this.handleCheckVictory(),
  };

  constructor(options: EncounterEngineOptions) {
    const party = parseDefinitions(options.party, CombatSide.PARTY);
    const opposition = parseDefinitions(options.opposition, CombatSide.MONSTER);
    this.context = new CombatContext(party, opposition);
    this.config = Object.freeze(resolveConfig(options.config));
    this.dice = options.dice ?? new RandomDiceService();
    this.providers = new Map(Object.entries(options.providers ?? {}));
    this.defaultProvider = options.defaultProvider ?? new RandomTacticalProvider(this.dice);
    this.encounterId = options.encounterId ?? uuidv4();
    this.logger = options.logger ?? silentLogger;
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  get state(): EncounterState {
    return this.currentState;
  }

  get outcome(): EncounterOutcome | null {
    return this.currentOutcome;
  }

  get roundNumber(): number {
    return this.context.roundNumber;
  }

  get currentCombatantId(): string | null {
    return this.context.currentCombatantId;
  }

  /** Choices offered for the current turn; empty outside AWAIT_INTENT */
  get pendingChoices(): readonly ActionChoice[] {
    return this.currentState === EncounterState.AWAIT_INTENT ? this.choices : [];
  }

  get needsIntent(): boolean {
    return this.awaitingExternal();
  }

  get eventCount(): number {
    return this.log.length;
  }

  /**
   * Perform one state transition.
   * @param intent only valid while awaiting the current combatant's intent
   * @throws EncounterLoopError when the encounter has ended
   * @throws EncounterUsageError when the intent is submitted at the wrong time or for the wrong combatant
   */
  step(intent?: ActionIntent): StepResult {
    const state = this.currentState;
    if (state === EncounterState.ENDED) {
      throw new EncounterLoopError('Cannot step an ended encounter', { encounterId: this.encounterId });
    }
    if (intent !== undefined) {
      this.acceptIntent(intent, state);
    }

    const start = this.log.length;
    try {
      this.handlers[state]();
    } catch (error) {
      this.fault(error, state);
    }
    return this.result(start);
  }

  /**
   * Step until an external decision is needed or the encounter ends.
   * Exhausting the budget faults the encounter.
   * @throws EncounterLoopError on budget exhaustion or when already ended
   */
  stepUntilDecision(intent?: ActionIntent, maxSteps: number = this.config.maxSteps): StepResult {
    if (this.state === EncounterState.ENDED) {
      throw new EncounterLoopError('Cannot step an ended encounter', { encounterId: this.encounterId });
    }

    const start = this.log.length;
    let pending = intent;
    let steps = 0;
    while (this.currentState !== EncounterState.ENDED && !(pending === undefined && this.awaitingExternal())) {
      if (steps >= maxSteps) {
        const error = new EncounterLoopError(`Step budget of ${maxSteps} exhausted`, {
          encounterId: this.encounterId,
          state: this.currentState,
          maxSteps,
        });
        this.fault(error, this.currentState);
        throw error;
      }
      this.step(pending);
      pending = undefined;
      steps++;
    }
    return this.result(start);
  }

  /**
   * Drive an encounter with no external combatants to its end.
   * @throws EncounterUsageError if an external decision is reached
   */
  runToCompletion(maxSteps: number = this.config.maxSteps): StepResult {
    const result = this.stepUntilDecision(undefined, maxSteps);
    if (result.needsIntent) {
      throw new EncounterUsageError('Encounter is waiting on an external combatant', {
        combatantId: result.pendingCombatantId ?? undefined,
      });
    }
    return result;
  }

  getView(): CombatView {
    return buildCombatView(this.context, {
      encounterId: this.encounterId,
      state: this.currentState,
      outcome: this.currentOutcome,
    });
  }

  /**
   * Events from `sinceIndex` onward; the log is append-only.
   */
  getEvents(sinceIndex = 0): readonly EncounterEvent[] {
    return this.log.slice(Math.max(0, sinceIndex));
  }

  // ==========================================================================
  // State handlers
  // ==========================================================================

  private handleInit(): void {
    const combatantIds = this.context.roster().map((c) => c.id);
    this.emit({ type: 'encounter_started', encounterId: this.encounterId, combatantIds });
    if (this.config.surprise) {
      // Recorded only; nobody loses a turn
      const partyRoll = this.dice.roll(SURPRISE_DIE);
      const monsterRoll = this.dice.roll(SURPRISE_DIE);
      this.emit({
        type: 'surprise_rolled',
        partyRoll,
        monsterRoll,
        partySurprised: monsterRoll > partyRoll,
        monsterSurprised: partyRoll > monsterRoll,
      });
    }
    this.logger.info('Encounter started', {
      encounterId: this.encounterId,
      combatants: combatantIds.length,
      turnOrder: this.config.turnOrder,
    });
    this.transition(EncounterState.ROUND_START);
  }

  private handleRoundStart(): void {
    this.context.roundNumber += 1;
    this.emit({ type: 'round_started', roundNumber: this.context.roundNumber });

    const active = this.context.active();
    let queue: string[];
    if (this.config.turnOrder === 'initiative') {
      const rolls = active.map((c): [string, number] => [c.id, this.dice.roll(this.config.initiativeDie)]);
      // Array sort is stable: ties keep roster order
      rolls.sort((a, b) => b[1] - a[1]);
      this.emit({ type: 'initiative_rolled', order: rolls });
      queue = rolls.map(([id]) => id);
    } else {
      queue = active.map((c) => c.id);
    }

    this.context.turnQueue = queue;
    this.emit({ type: 'turn_queue_built', queue: [...queue] });
    this.transition(EncounterState.TURN_START);
  }

  private handleTurnStart(): void {
    const nextId = this.context.turnQueue.shift();
    if (nextId === undefined) {
      this.context.currentCombatantId = null;
      this.transition(EncounterState.CHECK_VICTORY);
      return;
    }

    const combatant = this.context.get(nextId);
    if (!combatant || !this.context.isActive(combatant)) {
      return;
    }
    this.context.currentCombatantId = combatant.id;

    const skipReason = this.context.conditions.skipReason(combatant.id);
    if (skipReason !== undefined) {
      this.emit({ type: 'turn_skipped', combatantId: combatant.id, reason: skipReason });
      this.transition(EncounterState.CHECK_VICTORY);
      return;
    }
    if (this.context.opponentsOf(combatant).length === 0) {
      this.transition(EncounterState.CHECK_VICTORY);
      return;
    }

    this.emit({ type: 'turn_started', combatantId: combatant.id });
    this.choices = computeChoices(this.context, combatant);
    this.pendingIntent = null;
    this.transition(EncounterState.AWAIT_INTENT);
    if (combatant.controller === 'external') {
      this.emitNeedAction(combatant);
    }
  }

  private handleAwaitIntent(): void {
    if (this.pendingIntent !== null) {
      this.transition(EncounterState.VALIDATE_INTENT);
      return;
    }

    const combatant = this.current();
    if (combatant.controller === 'external') {
      return;
    }

    const provider = this.providers.get(combatant.id) ?? this.defaultProvider;
    this.pendingIntent = provider.chooseIntent(combatant.id, this.choices, this.getView());
    this.transition(EncounterState.VALIDATE_INTENT);
  }

  private handleValidateIntent(): void {
    const intent = this.requirePendingIntent();
    const combatant = this.current();
    const rejection = validateIntent(this.context, intent, combatant.id);

    if (rejection) {
      this.logger.debug('Intent rejected', { combatantId: combatant.id, code: rejection.code });
      this.emit({ type: 'action_rejected', combatantId: combatant.id, reasons: [rejection] });
      this.pendingIntent = null;
      this.transition(EncounterState.AWAIT_INTENT);
      if (combatant.controller === 'external') {
        this.emitNeedAction(combatant);
      }
      return;
    }

    this.transition(EncounterState.EXECUTE_ACTION);
  }

  private handleExecuteAction(): void {
    const intent = this.requirePendingIntent();
    const resolution = resolveIntent(this.context, intent, this.dice);
    for (const step of resolution.steps) {
      if (step.kind === 'event') {
        this.emit(step.event);
      } else {
        this.applyEffects([step.effect]);
      }
    }
    this.pendingIntent = null;
    this.transition(EncounterState.CHECK_DEATHS);
  }

  private handleCheckDeaths(): void {
    for (const combatant of this.context.roster()) {
      if (combatant.hp > 0 || this.context.announcedDeaths.has(combatant.id)) continue;
      combatant.status = 'dead';
      this.context.announcedDeaths.add(combatant.id);
      this.context.removeFromQueue(combatant.id);
      this.emit({ type: 'entity_died', entityId: combatant.id });
    }
    this.transition(EncounterState.CHECK_MORALE);
  }

  private handleCheckMorale(): void {
    const morale = checkMorale(this.context, this.dice, this.config.moraleDie);
    for (const event of morale.events) {
      this.emit(event);
    }
    this.applyEffects(morale.effects);
    this.transition(EncounterState.CHECK_VICTORY);
  }

  private handleCheckVictory(): void {
    if (this.context.active(CombatSide.MONSTER).length === 0) {
      this.end(EncounterOutcome.PARTY_VICTORY);
      return;
    }
    if (this.context.active(CombatSide.PARTY).length === 0) {
      this.end(EncounterOutcome.OPPOSITION_VICTORY);
      return;
    }

    if (this.context.turnQueue.length > 0) {
      this.transition(EncounterState.TURN_START);
      return;
    }

    this.context.currentCombatantId = null;
    for (const [combatantId, modifierId] of this.context.modifiers.tickRound()) {
      this.emit({ type: 'modifier_expired', combatantId, modifierId });
    }
    for (const [combatantId, conditionId] of this.context.conditions.tickRound()) {
      this.emit({ type: 'condition_expired', combatantId, conditionId, reason: 'duration' });
    }
    this.transition(EncounterState.ROUND_START);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private acceptIntent(intent: ActionIntent, state: EncounterState): void {
    if (state !== EncounterState.AWAIT_INTENT || this.pendingIntent !== null) {
      throw new EncounterUsageError(`Engine is not awaiting an intent (state: ${state})`, { state });
    }
    if (intent.actorId !== this.context.currentCombatantId) {
      throw new EncounterUsageError(
        `Intent is for ${intent.actorId}, but it is ${this.context.currentCombatantId ?? 'nobody'}'s turn`,
        { actorId: intent.actorId, currentCombatantId: this.context.currentCombatantId ?? undefined }
      );
    }
    this.pendingIntent = intent;
  }

  private awaitingExternal(): boolean {
    if (this.currentState !== EncounterState.AWAIT_INTENT || this.pendingIntent !== null) {
      return false;
    }
    const id = this.context.currentCombatantId;
    return id !== null && this.context.get(id)?.controller === 'external';
  }

  private applyEffects(effects: readonly Effect[]): void {
    for (const effect of effects) {
      for (const event of applyEffect(this.context, effect)) {
        this.emit(event);
      }
    }
  }

  private emitNeedAction(combatant: Combatant): void {
    this.emit({ type: 'need_action', combatantId: combatant.id, available: [...this.choices] });
  }

  private current(): Combatant {
    const id = this.context.currentCombatantId;
    const combatant = id === null ? undefined : this.context.get(id);
    if (!combatant) {
      throw new Error(`No current combatant in state ${this.currentState}`);
    }
    return combatant;
  }

  private requirePendingIntent(): ActionIntent {
    if (this.pendingIntent === null) {
      throw new Error(`No pending intent in state ${this.currentState}`);
    }
    return this.pendingIntent;
  }

  private emit(event: EncounterEvent): void {
    this.log.push(deepFreeze(event));
  }

  private transition(next: EncounterState): void {
    this.logger.debug('State transition', { encounterId: this.encounterId, from: this.currentState, to: next });
    this.currentState = next;
  }

  private end(outcome: EncounterOutcome): void {
    this.currentOutcome = outcome;
    this.context.currentCombatantId = null;
    this.emit({ type: 'victory_determined', outcome });
    this.logger.info('Encounter ended', {
      encounterId: this.encounterId,
      outcome,
      rounds: this.context.roundNumber,
    });
    this.transition(EncounterState.ENDED);
  }

  private fault(error: unknown, state: EncounterState): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error('Encounter faulted', {
      encounterId: this.encounterId,
      state,
      errorType: err.name,
      error: err.message,
    });
    this.emit({ type: 'encounter_faulted', state, errorType: err.name, message: err.message });
    this.currentOutcome = EncounterOutcome.FAULTED;
    this.pendingIntent = null;
    this.currentState = EncounterState.ENDED;
  }

  private result(start: number): StepResult {
    const needsIntent = this.awaitingExternal();
    return {
      state: this.currentState,
      needsIntent,
      pendingCombatantId: needsIntent ? this.context.currentCombatantId : null,
      events: this.log.slice(start),
    };
  }
}
