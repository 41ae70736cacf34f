import { ConsoleLogger } from '@nestjs/common';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { ClsModuleOptions, ClsService, ClsServiceManager } from 'nestjs-cls';
import { v4 as uuidv4 } from 'uuid';

/**
 * ClsModule options that reuse any non-empty `header` value as the correlation
 * id (or generate one), keep it in the request's CLS context and echo it on the response.
 * The CLS context ends with the request on every exit path.
 */
export function correlationClsOptions(
  header: string,
  overrides: Partial<ClsModuleOptions> = {},
): ClsModuleOptions {
  const headerKey = header.toLowerCase();
  return {
    global: true,
    ...overrides,
    middleware: {
      mount: true,
      generateId: true,
      idGenerator: (req: IncomingMessage) => {
        const incoming = req.headers[headerKey];
        return typeof incoming === 'string' && incoming.trim() !== '' ? incoming : uuidv4();
      },
      setup: (cls: ClsService, _req: IncomingMessage, res: ServerResponse) => {
        res.setHeader(header, cls.getId());
      },
      ...overrides.middleware,
    },
  };
}

export function currentCorrelationId(): string | undefined {
  const cls = ClsServiceManager.getClsService();
  return cls.isActive() ? cls.getId() : undefined;
}

/** ConsoleLogger that tags every line written inside a request with its id. */
export class CorrelationLogger extends ConsoleLogger {
  protected formatContext(context: string): string {
    const formatted = super.formatContext(context);
    const requestId = currentCorrelationId();
    return requestId ? `${formatted}[${requestId}] ` : formatted;
  }
}
