import { createDecorator } from '@toss/nestjs-aop';
import { EnforceOptions } from './EnforceOptions';

export const ENFORCE_SYMBOL = Symbol('policy-gateway:enforce');

/**
 * Decorator that asks the policy engine for a decision before the method
 * runs. The method executes only when the decision allows it.
 *
 * Works on injectable service methods via the EnforceAspect.
 *
 * Example:
 *   @Enforce({
 *     subject: (ctx) => String(ctx.args[0]),
 *     action: 'read',
 *     resource: (ctx) => `document:${ctx.args[1]}`,
 *   })
 *   async getDocument(userId: string, docId: string) { ... }
 */
export const Enforce = (options: EnforceOptions = {}) =>
  createDecorator(ENFORCE_SYMBOL, options);
