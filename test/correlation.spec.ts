import type { IncomingMessage, ServerResponse } from 'node:http';
import { CLS_ID, ClsService, ClsServiceManager } from 'nestjs-cls';
import { CorrelationLogger, correlationClsOptions, currentCorrelationId } from '../lib/correlation';

function incoming(headers: Record<string, string>): IncomingMessage {
  const request: Partial<IncomingMessage> = { headers };
  return request as IncomingMessage;
}

class InspectableLogger extends CorrelationLogger {
  contextFor(context: string): string {
    return this.formatContext(context);
  }
}

describe('correlation', () => {
  const options = correlationClsOptions('X-Request-ID');
  const idGenerator = options.middleware?.idGenerator;

  test('whenHeaderCarriesValidIdThenReused', () => {
    expect(idGenerator?.(incoming({ 'x-request-id': 'req-42' }))).toBe('req-42');
  });

  test.each(['trace id 42', 'x'.repeat(129)])('whenHeaderIs%pThenReusedAsIs', (value) => {
    expect(idGenerator?.(incoming({ 'x-request-id': value }))).toBe(value);
  });

  test.each(['', '   '])('whenHeaderIs%pThenFreshIdGenerated', (value) => {
    const id = idGenerator?.(incoming({ 'x-request-id': value }));
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  test('whenHeaderAbsentThenFreshIdGenerated', () => {
    expect(idGenerator?.(incoming({}))).toEqual(expect.any(String));
  });

  test('whenSetupRunsThenIdEchoedOnResponse', async () => {
    const setHeader = jest.fn();
    const response: Partial<ServerResponse> = { setHeader };
    const cls = { getId: jest.fn(() => 'req-42') };

    await options.middleware?.setup?.(cls as unknown as ClsService, incoming({}), response as ServerResponse);

    expect(setHeader).toHaveBeenCalledWith('X-Request-ID', 'req-42');
  });

  test('whenOverridesGivenThenMergedIntoMiddleware', () => {
    const merged = correlationClsOptions('X-Correlation-ID', { middleware: { saveReq: false } });

    expect(merged.global).toBe(true);
    expect(merged.middleware).toMatchObject({ mount: true, generateId: true, saveReq: false });
  });

  test('whenInsideContextThenIdAvailableAndLoggerTagsLines', () => {
    const cls = ClsServiceManager.getClsService();
    const logger = new InspectableLogger();

    const inside = cls.run(() => {
      cls.set(CLS_ID, 'req-42');
      return { id: currentCorrelationId(), context: logger.contextFor('DecisionClient') };
    });

    expect(inside.id).toBe('req-42');
    expect(inside.context.endsWith('[req-42] ')).toBe(true);
  });

  test('whenOutsideContextThenNoIdAndLinesUntagged', () => {
    const logger = new InspectableLogger();

    expect(currentCorrelationId()).toBeUndefined();
    expect(logger.contextFor('DecisionClient')).not.toContain('req-');
  });
});
