/** HTTP method (upper case) -> action name. */
export type ActionTable = Readonly<Record<string, string>>;

/**
 * Declarative mapping from a request path to a policy resource.
 *
 * Rules are evaluated in list order and the first rule whose `pattern`
 * matches wins; a more specific rule listed after a broader one never
 * applies. Patterns must not use the `g` or `y` flags.
 *
 * Example:
 *   {
 *     name: 'project-report',
 *     pattern: /\/projects\/([^/]+)\/reports\//,
 *     resource: (match) => `project:${match[1]}`,
 *     actions: { POST: 'export' },
 *   }
 */
export interface MappingRule {
  name: string;
  pattern: RegExp;
  /** Overrides the default action for the listed methods on matching paths. */
  actions?: ActionTable;
  resource: (match: RegExpExecArray, path: string) => string;
}

export const UNKNOWN_ACTION = 'unknown';

export const DEFAULT_ACTIONS: ActionTable = Object.freeze({
  GET: 'read',
  HEAD: 'read',
  OPTIONS: 'read',
  POST: 'write',
  PUT: 'write',
  PATCH: 'write',
  DELETE: 'write',
});

export const DEFAULT_MAPPING_RULES: readonly MappingRule[] = Object.freeze([
  {
    name: 'user-document',
    pattern: /\/users\/[^/]+\/documents\/([^/]+)/,
    resource: (match: RegExpExecArray) => `document:${match[1]}`,
  },
  {
    name: 'user-api',
    pattern: /\/users\//,
    resource: () => 'user-api',
  },
]);
