import { MissingIdentityError } from '../lib/errors';
import { MappingRule } from '../lib/MappingRule';
import { RequestMapper } from '../lib/RequestMapper';
import { createOptions } from './test-helpers';

describe('RequestMapper', () => {
  let mapper: RequestMapper;

  beforeEach(() => {
    mapper = new RequestMapper(createOptions());
  });

  describe('map', () => {
    test('whenReadingOwnDocumentThenMapsToDocumentResource', () => {
      const query = mapper.map({ preferred_username: 'alice' }, 'GET', '/api/users/alice/documents/123');
      expect(query).toEqual({ subject: 'alice', action: 'read', resource: 'document:123' });
    });

    test('whenWritingDocumentThenMapsToWriteAction', () => {
      const query = mapper.map({ preferred_username: 'bob' }, 'POST', '/api/users/bob/documents/456');
      expect(query).toEqual({ subject: 'bob', action: 'write', resource: 'document:456' });
    });

    test('whenOtherUserPathThenMapsToUserApi', () => {
      const query = mapper.map({ sub: 'u-1' }, 'DELETE', '/api/users/alice/settings');
      expect(query).toEqual({ subject: 'u-1', action: 'write', resource: 'user-api' });
    });

    test('whenNoRuleMatchesThenResourceIsThePath', () => {
      const query = mapper.map({ sub: 'u-1' }, 'GET', '/api/reports/2024');
      expect(query).toEqual({ subject: 'u-1', action: 'read', resource: '/api/reports/2024' });
    });

    test('whenPathHasQueryThenQueryIsIgnored', () => {
      expect(mapper.map({ sub: 'u-1' }, 'GET', '/api/reports?year=2024').resource).toBe('/api/reports');
      expect(mapper.map({ sub: 'u-1' }, 'GET', '/api/users/alice/documents/9?action=write').resource).toBe(
        'document:9',
      );
    });

    test('whenResultReturnedThenFrozen', () => {
      expect(Object.isFrozen(mapper.map({ sub: 'u-1' }, 'GET', '/api'))).toBe(true);
    });

    test('whenIdentityMissingThenThrowsMissingIdentity', () => {
      expect(() => mapper.map(undefined, 'GET', '/api/users/alice/documents/1')).toThrow(MissingIdentityError);
    });
  });

  describe('subjectOf', () => {
    test.each([
      { identity: { sub: 'u-1', preferred_username: 'alice', name: 'Alice A.' }, expected: 'alice' },
      { identity: { sub: 'u-1', preferred_username: '   ', name: 'Alice A.' }, expected: 'u-1' },
      { identity: { sub: '', name: 'Alice A.' }, expected: 'Alice A.' },
    ])('whenClaimsAre$identityThenSubjectIs$expected', ({ identity, expected }) => {
      expect(mapper.subjectOf(identity)).toBe(expected);
    });

    test('whenNoUsableClaimThenThrowsMissingIdentity', () => {
      expect(() => mapper.subjectOf({ email: 'alice@example.test' })).toThrow(
        'Verified identity carries no usable subject claim',
      );
    });

    test('whenIdentityUndefinedThenThrowsMissingIdentity', () => {
      expect(() => mapper.subjectOf(undefined)).toThrow('No verified identity available');
    });
  });

  describe('actionFor', () => {
    test.each([
      ['GET', 'read'],
      ['get', 'read'],
      ['HEAD', 'read'],
      ['OPTIONS', 'read'],
      ['POST', 'write'],
      ['PUT', 'write'],
      ['PATCH', 'write'],
      ['DELETE', 'write'],
      ['PROPFIND', 'unknown'],
    ])('whenMethodIs%sThenActionIs%s', (method, action) => {
      expect(mapper.actionFor(method)).toBe(action);
    });
  });

  describe('custom rules', () => {
    test('whenRulesOverlapThenFirstListedWins', () => {
      const rules: MappingRule[] = [
        { name: 'projects', pattern: /\/projects\//, resource: () => 'projects' },
        { name: 'project', pattern: /\/projects\/([^/]+)/, resource: (match) => `project:${match[1]}` },
      ];
      const custom = new RequestMapper(createOptions({ mappingRules: rules }));

      expect(custom.map({ sub: 'u-1' }, 'GET', '/api/projects/p-7').resource).toBe('projects');
    });

    test('whenRuleOverridesActionThenOverrideApplies', () => {
      const rules: MappingRule[] = [
        {
          name: 'report-export',
          pattern: /\/reports\/([^/]+)\/export/,
          actions: { POST: 'export' },
          resource: (match) => `report:${match[1]}`,
        },
      ];
      const custom = new RequestMapper(createOptions({ mappingRules: rules }));

      expect(custom.map({ sub: 'u-1' }, 'POST', '/api/reports/r-1/export')).toEqual({
        subject: 'u-1',
        action: 'export',
        resource: 'report:r-1',
      });
      expect(custom.map({ sub: 'u-1' }, 'GET', '/api/reports/r-1/export').action).toBe('read');
    });

    test('whenRulePatternIsGlobalThenConstructorThrows', () => {
      const rules: MappingRule[] = [{ name: 'broken', pattern: /\/x/g, resource: () => 'x' }];
      expect(() => new RequestMapper(createOptions({ mappingRules: rules }))).toThrow(
        "Mapping rule 'broken' must not use the g or y flag",
      );
    });
  });
});
