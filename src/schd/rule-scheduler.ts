import type { ScheduleRule } from '../types';

/**
 * `rate(<n> <unit>)` or a six-field `cron(...)` expression.
 */
export const SCHEDULE_EXPRESSION = /^(rate\([1-9]\d* (minute|minutes|hour|hours|day|days)\)|cron\(\S+( \S+){5}\))$/;

/** Recurring triggers that call back into the job runner. */
export interface RuleScheduler {
  findRule(name: string): Promise<ScheduleRule | undefined>;
  putRule(rule: ScheduleRule): Promise<void>;
  /** @returns whether a rule was removed */
  deleteRule(name: string): Promise<boolean>;
}

export class MemoryRuleScheduler implements RuleScheduler {
  private readonly rules = new Map<string, ScheduleRule>();

  async findRule(name: string): Promise<ScheduleRule | undefined> {
    const rule = this.rules.get(name);
    return rule && structuredClone(rule);
  }

  async putRule(rule: ScheduleRule): Promise<void> {
    this.rules.set(rule.name, structuredClone(rule));
  }

  async deleteRule(name: string): Promise<boolean> {
    return this.rules.delete(name);
  }
}
