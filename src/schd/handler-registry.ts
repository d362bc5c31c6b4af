import type { AppConfig, HandlerResult, JsonRecord } from '../types';
import { ConflictError, errorMessage, HandlerError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { sanitize } from '../utils/sanitize';
import { validateString } from '../utils/validation';

/** A unit of scheduled work. `check` is an optional dry run that validates a payload. */
export interface JobHandler {
  run(payload: JsonRecord): Promise<HandlerResult> | HandlerResult;
  check?(payload: JsonRecord): Promise<HandlerResult> | HandlerResult;
}

export type RunOptions = {
  /** Call the handler's `check` instead of `run`. */
  check?: boolean;
};

/** Builds a fresh handler per run; handlers that need settings read them from the config. */
export type HandlerFactory = (config: AppConfig) => JobHandler;

/**
 * Class-style key of a handler name: the last path or module segment, split on `_`,
 * each word's first letter capitalized and the words joined.
 *
 * @example
 * handlerKey('geo/geocoding_handler'); // 'GeocodingHandler'
 * handlerKey('social.create_post');    // 'CreatePost'
 * handlerKey('GeocodingHandler');      // 'GeocodingHandler'
 */
export function handlerKey(name: string): string {
  const base = name.split(/[/.]/).pop() ?? '';
  return base
    .split('_')
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join('');
}

/**
 * Named job handlers. Handlers are looked up by {@link handlerKey}, so
 * `geocoding_handler`, `tools/geocoding_handler` and `GeocodingHandler` resolve alike.
 */
export class HandlerRegistry {
  private readonly factories = new Map<string, HandlerFactory>();
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig = {},
    logger: Logger = new Logger('silent'),
  ) {
    this.logger = logger.child('schd');
  }

  /**
   * @throws ConflictError if a handler with the same key is already registered
   */
  register(name: string, handler: JobHandler | HandlerFactory): this {
    const key = handlerKey(validateString(name, 'Handler name'));
    if (key.length === 0) throw new HandlerError(`Handler name '${name}' has no usable segment`);
    if (this.factories.has(key)) throw new ConflictError(`handler ${key}`);

    this.factories.set(key, typeof handler === 'function' ? handler : () => handler);
    this.logger.debug('Handler registered', { name, key });
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(handlerKey(name));
  }

  /**
   * @throws HandlerError if no handler is registered under the name
   */
  resolve(name: string): JobHandler {
    const key = handlerKey(name);
    const factory = this.factories.get(key);
    if (!factory) throw new HandlerError(`Handler not found: ${name} (${key})`);
    return factory(this.config);
  }

  /**
   * Resolve and run a handler. Lookup failures, a missing `check` in check mode and
   * thrown errors are logged and reported as an unsuccessful result rather than rethrown.
   */
  async loadAndRun(name: string, payload: JsonRecord, options: RunOptions = {}): Promise<HandlerResult> {
    const mode = options.check ? 'check' : 'run';
    this.logger.debug('Running handler', { name, mode });
    try {
      const handler = this.resolve(name);
      const result = await this.invoke(handler, name, payload, mode);
      const out: HandlerResult = { success: result.success === true, output: sanitize(result.output) };
      if (result.message !== undefined) out.message = result.message;
      this.logger.info('Handler finished', { name, mode, success: out.success });
      return out;
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error('Handler failed', { name, error: message });
      return { success: false, output: null, message };
    }
  }

  private invoke(
    handler: JobHandler,
    name: string,
    payload: JsonRecord,
    mode: 'run' | 'check',
  ): Promise<HandlerResult> | HandlerResult {
    if (mode === 'run') return handler.run(payload);
    if (!handler.check) throw new HandlerError(`Handler '${name}' has no check method`);
    return handler.check(payload);
  }
}
