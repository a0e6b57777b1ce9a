import type pino from 'pino';
import type { Config } from '../../config/index.js';
import type { Filter, Update } from '../filters/Filter.js';
import { extractUpdate, type UpdatePayload } from '../filters/extract.js';
import { commands } from '../filters/command.js';
import { createLogger } from '../../utils/logger.js';
import { RouterError } from '../../utils/errors.js';

export type UpdateHandler = (update: Update, payload: UpdatePayload) => void | Promise<void>;

export interface UpdateRouterOptions {
  botUsername?: string;
  /** Defaults to '/' */
  commandPrefix?: string;
}

export type DispatchResult = { matched: true; route: number } | { matched: false };

interface Route {
  filter: Filter;
  handler: UpdateHandler;
}

/**
 * Hands each update to the first registered route whose filter accepts it.
 * Routes are checked in registration order; at most one handler runs per update.
 */
export class UpdateRouter {
  private readonly logger = createLogger({ component: 'UpdateRouter' });
  private readonly routes: Route[] = [];
  private fallbackHandler: UpdateHandler | undefined;
  private readonly botUsername: string;
  private readonly commandPrefix: string;

  constructor(options: UpdateRouterOptions = {}) {
    this.botUsername = options.botUsername ?? '';
    this.commandPrefix = options.commandPrefix ?? '/';
  }

  static fromConfig(config: Config): UpdateRouter {
    const options: UpdateRouterOptions = { commandPrefix: config.commandPrefix };
    if (config.botUsername) {
      options.botUsername = config.botUsername;
    }
    return new UpdateRouter(options);
  }

  on(filter: Filter, handler: UpdateHandler): this {
    this.routes.push({ filter, handler });
    this.logger.debug({ route: this.routes.length - 1 }, 'Route registered');
    return this;
  }

  command(name: string, handler: UpdateHandler): this {
    return this.on(commands(this.commandPrefix, this.botUsername, name), handler);
  }

  fallback(handler: UpdateHandler): this {
    this.fallbackHandler = handler;
    return this;
  }

  async dispatch(update: Update): Promise<DispatchResult> {
    const payload = extractUpdate(update);
    const logger = this.logger.child({
      method: 'dispatch',
      updateId: update.update_id,
      kind: payload.kind,
    });

    for (const [index, route] of this.routes.entries()) {
      if (!route.filter.check(update)) {
        continue;
      }

      logger.debug({ route: index }, 'Route matched');
      await this.invoke(route.handler, update, payload, logger, `route ${index}`);
      return { matched: true, route: index };
    }

    logger.debug({ hasFallback: this.fallbackHandler !== undefined }, 'No route matched');
    if (this.fallbackHandler) {
      await this.invoke(this.fallbackHandler, update, payload, logger, 'fallback');
    }
    return { matched: false };
  }

  private async invoke(
    handler: UpdateHandler,
    update: Update,
    payload: UpdatePayload,
    logger: pino.Logger,
    label: string
  ): Promise<void> {
    try {
      await handler(update, payload);
    } catch (error) {
      logger.error({ error, handler: label }, 'Update handler failed');
      throw new RouterError('HANDLER_FAILED', `Handler for ${label} failed`, { cause: error });
    }
  }
}
