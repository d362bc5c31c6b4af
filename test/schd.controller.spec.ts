import { createControllers } from '../src/controllers';
import type { Controllers } from '../src/controllers';
import { handlerKey, HandlerRegistry } from '../src/schd/handler-registry';
import { NotFoundError, ValidationError, ConflictError, HandlerError } from '../src/utils/errors';
import { Logger } from '../src/utils/logger';
import { fixedClock, sequentialIds } from './helpers';

const config = {
  DYNAMODB_RINGDATA_TABLE: 'test_data',
  DYNAMODB_ENTITY_TABLE: 'test_entities',
  TANK_DOC_BASE_URL: 'https://docs.example.test',
};

// 2026-10-19T08:00:00Z
const QUEUED_AT = '1792396800';
const OUTPUT_PATH = 'acme/ops/schd_runs/2026-10-19/id-2.json';

function setup(): Controllers {
  return createControllers(config, {
    logger: new Logger('silent'),
    clock: fixedClock(),
    idGenerator: sequentialIds('id'),
  });
}

async function seedJob(c: Controllers, data: Record<string, unknown> = { handler: 'tools/daily_report', name: 'Daily' }) {
  await c.data.createDocument('acme', 'ops', 'schd_jobs', data, { docId: 'job-1' });
}

describe('SchdController', () => {
  describe('createJobRun', () => {
    test('runs the handler and records the output on the run document', async () => {
      const c = setup();
      await seedJob(c);
      c.handlers.register('daily_report', { run: () => ({ success: true, output: { rows: 3 } }) });

      const report = await c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'manual' });

      expect(report.runId).toBe('id-1');
      expect(report.success).toBe(true);
      expect(report.status).toBe('executed');
      expect(report.steps.map((s) => s.action)).toEqual([
        'get_job_document',
        'create_run',
        'call_handler',
        'store_output',
        'record_results',
      ]);

      const run = await c.data.getDocument('acme', 'ops', 'schd_runs', 'id-1');
      expect(run.data).toEqual({
        schd_jobs_id: 'job-1',
        trigger: 'manual',
        author: '',
        status: 'executed',
        time_queued: QUEUED_AT,
        time_executed: QUEUED_AT,
        output: OUTPUT_PATH,
      });

      const file = await c.docs.getFile(OUTPUT_PATH);
      expect(JSON.parse(file.body)).toEqual({ success: true, output: { rows: 3 } });
      expect(file.url).toBe(`https://docs.example.test/${OUTPUT_PATH}`);
    });

    test('a throwing handler yields an unsuccessful but executed run', async () => {
      const c = setup();
      await seedJob(c);
      c.handlers.register('DailyReport', {
        run: () => {
          throw new Error('boom');
        },
      });

      const report = await c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'cron', author: 'ops-bot' });

      expect(report.success).toBe(false);
      expect(report.steps[2]).toEqual({
        action: 'call_handler',
        success: false,
        detail: {
          handler: 'tools/daily_report',
          input: { portfolio: 'acme', org: 'ops', handler: 'tools/daily_report' },
          message: 'boom',
        },
      });
      const run = await c.data.getDocument('acme', 'ops', 'schd_runs', report.runId);
      expect(run.data.status).toBe('executed');
      expect(run.data.author).toBe('ops-bot');
      expect(JSON.parse((await c.docs.getFile(OUTPUT_PATH)).body)).toEqual({ success: false, output: null, message: 'boom' });
    });

    test('an unregistered handler is reported, not thrown', async () => {
      const c = setup();
      await seedJob(c, { handler: 'missing_handler' });

      const report = await c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'call' });

      expect(report.success).toBe(false);
      expect(report.steps[2]?.detail.message).toBe('Handler not found: missing_handler (MissingHandler)');
    });

    test('validates the job id, the job and the trigger', async () => {
      const c = setup();
      await expect(c.schd.createJobRun('acme', 'ops', { trigger: 'manual' })).rejects.toThrow(ValidationError);
      await expect(c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'manual' })).rejects.toThrow(
        NotFoundError,
      );

      await seedJob(c);
      await expect(c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'sometimes' })).rejects.toThrow(
        ValidationError,
      );
      expect((await c.data.listDocuments('acme', 'ops', 'schd_runs')).items).toHaveLength(0);
    });

    test('a job without a handler leaves a queued run behind', async () => {
      const c = setup();
      await seedJob(c, { name: 'No handler' });

      await expect(c.schd.createJobRun('acme', 'ops', { schd_jobs_id: 'job-1', trigger: 'manual' })).rejects.toThrow(
        ValidationError,
      );
      const runs = await c.data.listDocuments('acme', 'ops', 'schd_runs');
      expect(runs.items.map((r) => r.data.status)).toEqual(['new']);
    });
  });

  describe('rules', () => {
    test('create, find and remove a rule', async () => {
      const c = setup();
      const rule = await c.schd.createRule('acme', 'ops', 'daily', 'rate(1 day)', { schd_jobs_id: 'job-1' });
      expect(rule).toEqual({
        name: 'cron_acme_ops_daily',
        scheduleExpression: 'rate(1 day)',
        payload: { schd_jobs_id: 'job-1' },
        createdAt: '2026-10-19T08:00:00.000Z',
      });
      expect(await c.schd.findRule('acme', 'ops', 'daily')).toEqual(rule);

      await c.schd.removeRule('acme', 'ops', 'daily');
      await expect(c.schd.findRule('acme', 'ops', 'daily')).resolves.toBeUndefined();
      await expect(c.schd.removeRule('acme', 'ops', 'daily')).rejects.toThrow(NotFoundError);
    });

    test('accepts cron expressions and rejects anything else', async () => {
      const c = setup();
      await expect(c.schd.createRule('acme', 'ops', 'am', 'cron(0 8 * * ? *)', {})).resolves.toBeDefined();
      await expect(c.schd.createRule('acme', 'ops', 'bad', 'every day', {})).rejects.toThrow(ValidationError);
      await expect(c.schd.createRule('acme', 'ops', 'zero', 'rate(0 minutes)', {})).rejects.toThrow(ValidationError);
    });
  });
});

describe('SchdController handler calls', () => {
  function withGeocoder(): Controllers {
    const c = setup();
    c.handlers.register('geocoding_handler', {
      run: (p) => ({ success: true, output: { output: { tool: p.tool ?? null, org: p.org ?? null }, interface: 'map' } }),
      check: (p) => ({ success: true, output: { output: `would geocode ${String(p.q)}` } }),
    });
    return c;
  }

  test('handlerCall overrides portfolio, org and tool and lifts the canonical output', async () => {
    const c = withGeocoder();

    const call = await c.schd.handlerCall('acme', 'ops', 'geo', 'geocoding_handler', { org: 'spoofed', q: 'Lima' });

    expect(call).toEqual({
      success: true,
      action: 'handler_call',
      handler: 'geocoding_handler',
      input: { q: 'Lima', portfolio: 'acme', org: 'ops', tool: 'geo' },
      output: { tool: 'geo', org: 'ops' },
      interface: 'map',
      stack: { success: true, output: { output: { tool: 'geo', org: 'ops' }, interface: 'map' } },
    });
  });

  test('handlerCall reports failures with a list output', async () => {
    const c = setup();
    c.handlers.register('quota', { run: () => ({ success: false, output: 'quota exceeded' }) });
    c.handlers.register('crash', {
      run: () => {
        throw new Error('boom');
      },
    });

    const refused = await c.schd.handlerCall('acme', 'ops', 'billing', 'quota', {});
    expect(refused.success).toBe(false);
    expect(refused.output).toEqual(['quota exceeded']);
    expect(refused.interface).toBeNull();

    const crashed = await c.schd.handlerCall('acme', 'ops', 'billing', 'crash', {});
    expect(crashed.output).toEqual(['boom']);
    expect(crashed.stack).toEqual({ success: false, output: null, message: 'boom' });
  });

  test('handlerCheck runs check instead of run', async () => {
    const c = setup();
    const run = jest.fn(() => ({ success: true, output: null }));
    c.handlers.register('geocoding_handler', { run, check: (p) => ({ success: true, output: { output: `would geocode ${String(p.q)}` } }) });

    const call = await c.schd.handlerCheck('acme', 'ops', 'geo', 'geocoding_handler', { q: 'Lima' });

    expect(call.action).toBe('handler_check');
    expect(call.success).toBe(true);
    expect(call.output).toBe('would geocode Lima');
    expect(call.interface).toBeNull();
    expect(run).not.toHaveBeenCalled();
  });

  test('handlerCheck on a handler without check fails with the reason', async () => {
    const c = setup();
    c.handlers.register('plain', { run: () => ({ success: true, output: null }) });

    const call = await c.schd.handlerCheck('acme', 'ops', 'tools', 'plain', {});

    expect(call.success).toBe(false);
    expect(call.output).toBe("Handler 'tools/plain' has no check method");
  });

  test('directRun sets the tool and requires <extension>/<handler>', async () => {
    const c = withGeocoder();

    const call = await c.schd.directRun('geo/geocoding_handler', { q: 'Lima' });
    expect(call.action).toBe('direct_run');
    expect(call.handler).toBe('geocoding_handler');
    expect(call.input).toEqual({ q: 'Lima', tool: 'geo' });
    expect(call.output).toEqual({ tool: 'geo', org: null });

    await expect(c.schd.directRun('geocoding_handler', {})).rejects.toThrow(ValidationError);
    await expect(c.schd.directRun('geo/tools/geocoding_handler', {})).rejects.toThrow(ValidationError);
    await expect(c.schd.directRun('/geocoding_handler', {})).rejects.toThrow(ValidationError);
  });
});

describe('HandlerRegistry', () => {
  test('handlerKey normalizes paths and module names', () => {
    expect(handlerKey('geo/geocoding_handler')).toBe('GeocodingHandler');
    expect(handlerKey('social.create_post')).toBe('CreatePost');
    expect(handlerKey('GeocodingHandler')).toBe('GeocodingHandler');
  });

  test('factories receive the config on every resolve', async () => {
    const registry = new HandlerRegistry({ WL_NAME: 'acme' });
    registry.register('whoami', (cfg) => ({ run: () => ({ success: true, output: String(cfg.WL_NAME) }) }));

    await expect(registry.loadAndRun('whoami', {})).resolves.toEqual({ success: true, output: 'acme' });
  });

  test('rejects duplicate registrations and unknown lookups', () => {
    const registry = new HandlerRegistry();
    registry.register('daily_report', { run: () => ({ success: true, output: null }) });

    expect(registry.has('jobs/daily_report')).toBe(true);
    expect(() => registry.register('reports/daily_report', { run: () => ({ success: true, output: null }) })).toThrow(
      ConflictError,
    );
    expect(() => registry.resolve('weekly_report')).toThrow(HandlerError);
  });
});
