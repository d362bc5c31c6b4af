import type { JsonRecord, JsonValue } from './doc';

export type JobTrigger = 'manual' | 'call' | 'cron';

export type JobRunPayload = {
  schd_jobs_id?: string;
  trigger?: string;
  author?: string;
  [key: string]: JsonValue | undefined;
};

export type HandlerResult = {
  success: boolean;
  output: JsonValue;
  message?: string;
};

export type ScheduleRule = {
  name: string;
  scheduleExpression: string;
  payload: JsonRecord;
  createdAt: string;
};

export type JobRunStep = {
  action: 'get_job_document' | 'create_run' | 'call_handler' | 'store_output' | 'record_results';
  success: boolean;
  detail: JsonRecord;
};

export type JobRunReport = {
  runId: string;
  status: 'executed';
  success: boolean;
  steps: JobRunStep[];
};

export type HandlerCallAction = 'direct_run' | 'handler_call' | 'handler_check';

/**
 * Result of calling a handler outside a job run. `output` and `interface` are lifted out of
 * a handler output shaped `{ output, interface }`; `stack` keeps the raw handler result.
 */
export type HandlerCall = {
  success: boolean;
  action: HandlerCallAction;
  handler: string;
  input: JsonRecord;
  output: JsonValue;
  interface: JsonValue;
  stack: JsonRecord;
};
