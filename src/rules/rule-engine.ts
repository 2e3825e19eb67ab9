import type { GameAction } from '../game-actions';
import type { Game } from '../game-engine';
import { GameStateError } from '../errors';

export enum ViolationSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  FATAL = 'fatal'
}

const SEVERITY_RANK: Record<ViolationSeverity, number> = {
  [ViolationSeverity.INFO]: 0,
  [ViolationSeverity.WARNING]: 1,
  [ViolationSeverity.ERROR]: 2,
  [ViolationSeverity.FATAL]: 3
};

export const severityAtLeast = (severity: ViolationSeverity, threshold: ViolationSeverity): boolean =>
  SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];

/** Error and Fatal violations block an action; Info and Warning do not. */
export const isBlocking = (violation: RuleViolation): boolean =>
  severityAtLeast(violation.severity, ViolationSeverity.ERROR);

export interface RuleViolation {
  ruleName: string;
  message: string;
  severity: ViolationSeverity;
}

export interface Rule {
  readonly name: string;
  readonly description: string;
  /** Must not mutate the game. */
  validate(game: Game, action: GameAction): RuleViolation | null;
  /** Runs after every rule has accepted the action. */
  applyEffect(game: Game, action: GameAction): RuleViolation | null;
}

export abstract class BaseRule implements Rule {
  abstract readonly name: string;
  abstract readonly description: string;

  abstract validate(game: Game, action: GameAction): RuleViolation | null;

  public applyEffect(_game: Game, _action: GameAction): RuleViolation | null {
    return null;
  }

  protected violation(message: string, severity: ViolationSeverity = ViolationSeverity.ERROR): RuleViolation {
    return { ruleName: this.name, message, severity };
  }
}

export interface RuleConfig {
  stopOnFirstViolation: boolean;
  autoApplyEffects: boolean;
  /** Violations below this severity are dropped. */
  minSeverity: ViolationSeverity;
}

export const DEFAULT_RULE_CONFIG: Readonly<RuleConfig> = Object.freeze({
  stopOnFirstViolation: false,
  autoApplyEffects: true,
  minSeverity: ViolationSeverity.WARNING
});

export type RuleApplication =
  | { ok: true; warnings: RuleViolation[] }
  | { ok: false; violations: RuleViolation[] };

/**
 * Ordered set of rules checked before an action is applied. Rules are keyed
 * by name; adding a rule under an existing name replaces it in place.
 */
export class RuleEngine {
  private rules: Rule[] = [];
  private readonly config: RuleConfig;

  constructor(rules: Rule[] = [], config: Partial<RuleConfig> = {}) {
    this.config = { ...DEFAULT_RULE_CONFIG, ...config };
    for (const rule of rules) {
      this.addRule(rule);
    }
  }

  public addRule(rule: Rule): void {
    const index = this.rules.findIndex((existing) => existing.name === rule.name);
    if (index === -1) {
      this.rules.push(rule);
    } else {
      this.rules[index] = rule;
    }
  }

  public removeRule(name: string): boolean {
    const before = this.rules.length;
    this.rules = this.rules.filter((rule) => rule.name !== name);
    return this.rules.length !== before;
  }

  public hasRule(name: string): boolean {
    return this.rules.some((rule) => rule.name === name);
  }

  public getRule(name: string): Rule | undefined {
    return this.rules.find((rule) => rule.name === name);
  }

  public getRuleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  public getConfig(): Readonly<RuleConfig> {
    return { ...this.config };
  }

  public updateConfig(config: Partial<RuleConfig>): void {
    if (config.minSeverity !== undefined && !(config.minSeverity in SEVERITY_RANK)) {
      throw new GameStateError('INVALID_CONFIG', `Unknown severity: ${config.minSeverity}`);
    }
    Object.assign(this.config, config);
  }

  get autoApplyEffects(): boolean {
    return this.config.autoApplyEffects;
  }

  public validateAction(game: Game, action: GameAction): RuleViolation[] {
    const violations: RuleViolation[] = [];
    for (const rule of this.rules) {
      const violation = rule.validate(game, action);
      if (!violation || !severityAtLeast(violation.severity, this.config.minSeverity)) {
        continue;
      }
      violations.push(violation);
      if (this.config.stopOnFirstViolation) {
        break;
      }
    }
    return violations;
  }

  /**
   * Runs every rule's effect hook in order. Returns the first failure; hooks
   * after it do not run.
   */
  public applyRuleEffects(game: Game, action: GameAction): RuleViolation | null {
    for (const rule of this.rules) {
      const failure = rule.applyEffect(game, action);
      if (failure) {
        game.log.warn('[RULES] Rule effect failed', { rule: rule.name, action: action.type, message: failure.message });
        return failure;
      }
    }
    return null;
  }

  public applyAction(game: Game, action: GameAction): RuleApplication {
    const violations = this.validateAction(game, action);
    if (violations.some(isBlocking)) {
      return { ok: false, violations };
    }

    if (this.config.autoApplyEffects) {
      const failure = this.applyRuleEffects(game, action);
      if (failure) {
        return { ok: false, violations: [failure] };
      }
    }

    return { ok: true, warnings: violations };
  }
}
