import type { JsonRecord, JsonValue } from '../types';
import { NotFoundError } from '../utils/errors';

/** Agent state a workspace starts with; keys already present are kept. */
export function emptyAgentState(): JsonRecord {
  return { beliefs: {}, desire: '', intent: [], history: [], in_progress: null };
}

function isJsonRecord(value: JsonValue | undefined): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function recordAt(parent: JsonRecord, key: string): JsonRecord {
  const current = parent[key];
  if (isJsonRecord(current)) return current;
  const created: JsonRecord = {};
  parent[key] = created;
  return created;
}

function listAt(parent: JsonRecord, key: string): JsonValue[] {
  const current = parent[key];
  if (Array.isArray(current)) return current;
  const created: JsonValue[] = [];
  parent[key] = created;
  return created;
}

function stepKey(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

/**
 * The step of plan `planId` whose `step_id` matches `stepId`. Ids compare as strings, so
 * `0` and `'0'` are the same step. The returned record is the live one inside `state`.
 *
 * @throws NotFoundError if the plan has no such step
 */
export function getStep(state: JsonRecord, planId: string, stepId: string | number): JsonRecord {
  const machine = state.state_machine;
  const plan = isJsonRecord(machine) ? machine[planId] : undefined;
  const steps = isJsonRecord(plan) && Array.isArray(plan.steps) ? plan.steps : [];
  const target = String(stepId);

  const step = steps.find((s): s is JsonRecord => isJsonRecord(s) && stepKey(s.step_id) === target);
  if (!step) {
    throw new NotFoundError(`step '${target}' in state machine of plan '${planId}' (${steps.length} step(s))`);
  }
  return step;
}

const STEP_FIELDS = ['status', 'error', 'started_at', 'finished_at'];
const LOG_FIELDS = ['tool', 'status', 'nonce', 'message', 'type', 'actionable'];

function pick(source: JsonRecord, keys: string[]): JsonRecord {
  const out: JsonRecord = {};
  for (const k of keys) {
    const v = source[k];
    if (v !== undefined) out[k] = v;
  }
  return out;
}

/**
 * Apply agent changes to a copy of a workspace state. Recognised keys:
 *
 * - `belief` (object): merged into `beliefs`
 * - `belief_history` (object): one `{ type: 'belief', key, val, time }` entry per key appended to `history`
 * - `desire`, `action` (string), `intent`, `follow_up`, `slots` (object), `is_active` (boolean): replaced
 * - `cache`: an object is merged into `cache`; an array becomes `cache.results`
 * - `plan` (object with `id`): stored under `plan[id]`
 * - `new_state_machine` (object with `plan_id`): stored under `state_machine[plan_id]` unless one exists
 * - `step_state` (object with `plan_id`, `plan_step`): copies status and timing fields onto the step
 * - `plan_state` (object with `plan_id`): copies `status` and `updated_at` onto the plan's state machine
 * - `action_log` (object with `plan_id`, `plan_step`): appends a log entry to the step's `action_log`
 *
 * Unknown keys and values of the wrong shape are ignored.
 *
 * @throws NotFoundError if `step_state` or `action_log` names a step the plan does not have
 */
export function applyWorkspaceChanges(state: JsonRecord, changes: JsonRecord, now: string): JsonRecord {
  const next: JsonRecord = { ...emptyAgentState(), ...structuredClone(state) };

  for (const [key, value] of Object.entries(structuredClone(changes))) {
    switch (key) {
      case 'belief':
        if (isJsonRecord(value)) Object.assign(recordAt(next, 'beliefs'), value);
        break;
      case 'belief_history':
        if (isJsonRecord(value)) {
          const history = listAt(next, 'history');
          for (const [k, v] of Object.entries(value)) history.push({ type: 'belief', key: k, val: v, time: now });
        }
        break;
      case 'desire':
      case 'action':
        if (typeof value === 'string') next[key] = value;
        break;
      case 'intent':
      case 'follow_up':
      case 'slots':
        if (isJsonRecord(value)) next[key] = value;
        break;
      case 'is_active':
        if (typeof value === 'boolean') next[key] = value;
        break;
      case 'cache':
        if (isJsonRecord(value)) Object.assign(recordAt(next, 'cache'), value);
        else if (Array.isArray(value)) recordAt(next, 'cache').results = value;
        break;
      case 'plan':
        if (isJsonRecord(value) && typeof value.id === 'string') recordAt(next, 'plan')[value.id] = value;
        break;
      case 'new_state_machine':
        if (isJsonRecord(value) && typeof value.plan_id === 'string') {
          const machine = recordAt(next, 'state_machine');
          if (machine[value.plan_id] === undefined) machine[value.plan_id] = value;
        }
        break;
      case 'step_state':
        if (isJsonRecord(value) && typeof value.plan_id === 'string') {
          const stepId = stepKey(value.plan_step);
          if (stepId !== undefined) Object.assign(getStep(next, value.plan_id, stepId), pick(value, STEP_FIELDS));
        }
        break;
      case 'plan_state':
        if (isJsonRecord(value) && typeof value.plan_id === 'string') {
          Object.assign(recordAt(recordAt(next, 'state_machine'), value.plan_id), pick(value, ['status', 'updated_at']));
        }
        break;
      case 'action_log':
        if (isJsonRecord(value) && typeof value.plan_id === 'string') {
          const stepId = stepKey(value.plan_step);
          if (stepId !== undefined) listAt(getStep(next, value.plan_id, stepId), 'action_log').push(pick(value, LOG_FIELDS));
        }
        break;
      default:
        break;
    }
  }
  return next;
}
