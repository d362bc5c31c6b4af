import type {
  HandlerCall,
  HandlerCallAction,
  HandlerResult,
  JobRunPayload,
  JobRunReport,
  JobRunStep,
  JobTrigger,
  JsonRecord,
  JsonValue,
  ScheduleRule,
} from '../types';
import type { DataController } from '../data/data.controller';
import type { DocsController } from '../docs/docs.controller';
import type { Clock } from '../utils/date-utils';
import { isoDay, toIso, unixSeconds, utcClock } from '../utils/date-utils';
import { errorMessage, NotFoundError } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { ControllerOptions } from '../utils/runtime';
import { sanitizeRecord } from '../utils/sanitize';
import { validateKeySegment, validateLiteral, validateString, ValidationError } from '../utils/validation';
import type { HandlerRegistry } from './handler-registry';
import type { RuleScheduler } from './rule-scheduler';
import { SCHEDULE_EXPRESSION } from './rule-scheduler';

export const JOBS_RING = 'schd_jobs';
export const RUNS_RING = 'schd_runs';
export const JOB_TRIGGERS: readonly JobTrigger[] = ['manual', 'call', 'cron'];

export type SchdDeps = {
  data: DataController;
  docs: DocsController;
  rules: RuleScheduler;
  handlers: HandlerRegistry;
};

export function ruleName(portfolio: string, org: string, name: string): string {
  return `cron_${portfolio}_${org}_${name}`;
}

function isJsonRecord(value: JsonValue): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Lift `output` and `interface` out of a handler output shaped `{ output, interface }`.
 * Any other output is the canonical output itself.
 */
export function canonicalOutput(result: HandlerResult): { output: JsonValue; interface: JsonValue } {
  const out = result.output;
  if (isJsonRecord(out) && 'output' in out) {
    return { output: out.output ?? null, interface: out.interface ?? null };
  }
  return { output: out, interface: null };
}

function stackOf(result: HandlerResult): JsonRecord {
  const stack: JsonRecord = { success: result.success, output: result.output };
  if (result.message !== undefined) stack.message = result.message;
  return stack;
}

/**
 * Scheduled jobs: recurring rules plus the run pipeline a rule (or a user) triggers.
 *
 * A job is a document in the `schd_jobs` ring naming a registered handler. Every run
 * leaves a document in `schd_runs` and the handler's result as a JSON file.
 */
export class SchdController {
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly deps: SchdDeps,
    options: ControllerOptions = {},
  ) {
    this.logger = (options.logger ?? new Logger('silent')).child('schd');
    this.clock = options.clock ?? utcClock;
  }

  async findRule(portfolio: string, org: string, timer: string): Promise<ScheduleRule | undefined> {
    return this.deps.rules.findRule(this.ruleName(portfolio, org, timer));
  }

  /**
   * Create or replace the recurring rule that triggers a job.
   *
   * @throws ValidationError if the schedule expression is not a `rate(...)` or `cron(...)` expression
   */
  async createRule(
    portfolio: string,
    org: string,
    name: string,
    scheduleExpression: string,
    payload: Record<string, unknown>,
  ): Promise<ScheduleRule> {
    const expr = validateString(scheduleExpression, 'Schedule expression').trim();
    if (!SCHEDULE_EXPRESSION.test(expr)) {
      throw new ValidationError(`Schedule expression '${expr}' must be rate(...) or cron(...)`);
    }

    const rule: ScheduleRule = {
      name: this.ruleName(portfolio, org, name),
      scheduleExpression: expr,
      payload: sanitizeRecord(payload),
      createdAt: toIso(this.clock()),
    };
    await this.deps.rules.putRule(rule);
    this.logger.info('Rule created', { rule: rule.name, scheduleExpression: expr });
    return rule;
  }

  /**
   * @throws NotFoundError if the rule does not exist
   */
  async removeRule(portfolio: string, org: string, name: string): Promise<void> {
    const rule = this.ruleName(portfolio, org, name);
    const removed = await this.deps.rules.deleteRule(rule);
    if (!removed) throw new NotFoundError(`rule ${rule}`);
    this.logger.info('Rule removed', { rule });
  }

  /**
   * Run a job once.
   *
   * 1. Load the job document named by `payload.schd_jobs_id`
   * 2. Queue a run document (`status: 'new'`)
   * 3. Run the job's handler
   * 4. Store the handler result as JSON under `schd_runs/<day>`
   * 5. Mark the run `executed` and point its `output` at the stored file
   *
   * Handler failures do not throw; they show up as `success: false` in the report.
   *
   * @throws ValidationError if the job id or trigger is missing or invalid, or the job names no handler
   * @throws NotFoundError if the job document does not exist
   */
  async createJobRun(portfolio: string, org: string, payload: JobRunPayload): Promise<JobRunReport> {
    this.logger.debug('Job run requested', { portfolio, org, jobId: payload.schd_jobs_id ?? null });
    const steps: JobRunStep[] = [];
    const { data, docs, handlers } = this.deps;

    // 1. job document
    const jobId = validateString(payload.schd_jobs_id, 'schd_jobs_id');
    const job = await data.getDocument(portfolio, org, JOBS_RING, jobId);
    steps.push({ action: 'get_job_document', success: true, detail: { path: job.path } });

    // 2. run document
    const trigger = validateLiteral(payload.trigger, 'trigger', JOB_TRIGGERS);
    const run = await data.createDocument(portfolio, org, RUNS_RING, {
      ...payload,
      trigger,
      author: payload.author ?? '',
      status: 'new',
      time_queued: unixSeconds(this.clock()),
      time_executed: '.',
      output: '.',
    });
    steps.push({ action: 'create_run', success: true, detail: { runId: run.docId, path: run.path } });

    // 3. handler
    const handler = job.data.handler;
    if (typeof handler !== 'string' || handler.length === 0) {
      throw new ValidationError(`No handler in the job document ${job.path}`);
    }
    const input: JsonRecord = { portfolio, org, handler };
    const result = await handlers.loadAndRun(handler, input);
    const handlerDetail: JsonRecord = { handler, input };
    if (result.message !== undefined) handlerDetail.message = result.message;
    steps.push({ action: 'call_handler', success: result.success, detail: handlerDetail });

    // 4. handler output
    let output: string;
    try {
      const file = await docs.postFile(
        portfolio,
        org,
        `${RUNS_RING}/${isoDay(this.clock())}`,
        JSON.stringify(result),
        'application/json',
      );
      output = file.path;
      steps.push({ action: 'store_output', success: true, detail: { path: file.path } });
    } catch (err) {
      output = 'Could not store handler output';
      this.logger.error('Storing handler output failed', { runId: run.docId, error: errorMessage(err) });
      steps.push({ action: 'store_output', success: false, detail: { error: errorMessage(err) } });
    }

    // 5. results
    const changes = { output, status: 'executed', time_executed: unixSeconds(this.clock()) };
    await data.updateDocument(portfolio, org, RUNS_RING, run.docId, changes);
    steps.push({ action: 'record_results', success: true, detail: changes });

    this.logger.info('Job run executed', { runId: run.docId, handler, success: result.success });
    return { runId: run.docId, status: 'executed', success: result.success, steps };
  }

  /**
   * Run `<extension>/<handler>` directly, outside any job. The payload gets `tool` set
   * to the extension.
   *
   * @throws ValidationError if `handler` is not exactly `<extension>/<handler>`
   */
  async directRun(handler: string, payload: Record<string, unknown>): Promise<HandlerCall> {
    const parts = validateString(handler, 'Handler').split('/');
    const [extension, name] = parts;
    if (parts.length !== 2 || !extension || !name) {
      throw new ValidationError(`Handler '${handler}' must be '<extension>/<handler>'`);
    }
    const input: JsonRecord = { ...sanitizeRecord(payload), tool: extension };
    const result = await this.deps.handlers.loadAndRun(handler, input);
    return this.toCall('direct_run', name, input, result);
  }

  /**
   * Call an extension's handler on behalf of a portfolio and org. `portfolio`, `org` and
   * `tool` in the payload are overridden. A failed call's output is always a list.
   */
  async handlerCall(
    portfolio: string,
    org: string,
    extension: string,
    handler: string,
    payload: Record<string, unknown>,
  ): Promise<HandlerCall> {
    const input = this.callInput(portfolio, org, extension, handler, payload);
    const result = await this.deps.handlers.loadAndRun(`${extension}/${handler}`, input);
    return this.toCall('handler_call', handler, input, result);
  }

  /** Like {@link handlerCall}, but runs the handler's `check` instead of `run`. */
  async handlerCheck(
    portfolio: string,
    org: string,
    extension: string,
    handler: string,
    payload: Record<string, unknown>,
  ): Promise<HandlerCall> {
    const input = this.callInput(portfolio, org, extension, handler, payload);
    const result = await this.deps.handlers.loadAndRun(`${extension}/${handler}`, input, { check: true });
    return this.toCall('handler_check', handler, input, result);
  }

  private callInput(
    portfolio: string,
    org: string,
    extension: string,
    handler: string,
    payload: Record<string, unknown>,
  ): JsonRecord {
    validateKeySegment(handler, 'Handler');
    return {
      ...sanitizeRecord(payload),
      portfolio: validateKeySegment(portfolio, 'Portfolio'),
      org: validateKeySegment(org, 'Org'),
      tool: validateKeySegment(extension, 'Extension'),
    };
  }

  private toCall(action: HandlerCallAction, handler: string, input: JsonRecord, result: HandlerResult): HandlerCall {
    const canonical = canonicalOutput(result);
    let output = canonical.output;
    if (!result.success) {
      if (output === null) output = result.message ?? 'Handler failed';
      if (action !== 'handler_check' && !Array.isArray(output)) output = [output];
    }
    this.logger.info('Handler called', { action, handler, success: result.success });
    return {
      success: result.success,
      action,
      handler,
      input,
      output,
      interface: result.success ? canonical.interface : null,
      stack: stackOf(result),
    };
  }

  private ruleName(portfolio: string, org: string, name: string): string {
    return ruleName(
      validateKeySegment(portfolio, 'Portfolio'),
      validateKeySegment(org, 'Org'),
      validateKeySegment(name, 'Rule name'),
    );
  }
}
