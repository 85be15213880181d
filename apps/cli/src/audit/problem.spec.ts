import type { AuditProblem } from '@sqconf/types';
import { Group } from '../objects/group';
import { Platform } from '../platform/platform';
import { FakeTransport } from '../testing/fake-transport';
import { RecordEncoder } from '../writer/encoders';
import { problemEncoder, problemFilter, problemToJson, problemUrl } from './problem';
import { createProblem } from './rules';

const platform = new Platform({ url: 'http://localhost:9000/', transport: new FakeTransport(), maxRetries: 0 });
const emptyGroup = createProblem('GROUP_EMPTY', new Group(platform, { name: 'devs', membersCount: 0 }));
const tooManyGates = createProblem('QG_TOO_MANY_GATES', 'server', [7, 5]);

function encodeAll(encoder: RecordEncoder<AuditProblem>, problems: AuditProblem[]): string {
  return encoder.header() + problems.map((p, i) => encoder.encode(p, i)).join('') + encoder.footer(problems.length);
}

describe('problem output', () => {
  it('should take the url from the subject unless given', () => {
    expect(problemUrl(emptyGroup)).toBe('http://localhost:9000/admin/groups');
    expect(problemUrl(tooManyGates)).toBe('');
  });

  it('should encode CSV rows', () => {
    const text = encodeAll(problemEncoder({ format: 'csv' }), [emptyGroup, tooManyGates]);

    expect(text).toBe(
      'Problem,Type,Severity,Message\n' +
        "GROUP_EMPTY,GOVERNANCE,LOW,group 'devs' has no members\n" +
        'QG_TOO_MANY_GATES,GOVERNANCE,MEDIUM,"There are 7 quality gates, more than the 5 recommended"\n'
    );
  });

  it('should add server id and url columns with a custom separator', () => {
    const text = encodeAll(problemEncoder({ format: 'csv', withUrl: true, serverId: 'srv-1', separator: ';' }), [
      emptyGroup,
    ]);

    expect(text).toBe(
      'Server Id;Problem;Type;Severity;Message;URL\n' +
        "srv-1;GROUP_EMPTY;GOVERNANCE;LOW;group 'devs' has no members;http://localhost:9000/admin/groups\n"
    );
  });

  it('should encode a JSON array', () => {
    const text = encodeAll(problemEncoder({ format: 'json', withUrl: true }), [emptyGroup]);

    expect(JSON.parse(text)).toEqual([
      {
        problem: 'GROUP_EMPTY',
        type: 'GOVERNANCE',
        severity: 'LOW',
        message: "group 'devs' has no members",
        url: 'http://localhost:9000/admin/groups',
      },
    ]);
  });

  it('should put the server id first in JSON', () => {
    expect(Object.keys(problemToJson(tooManyGates, { serverId: 'srv-1' }))).toEqual([
      'serverId',
      'problem',
      'type',
      'severity',
      'message',
    ]);
  });
});

describe('problemFilter', () => {
  it('should accept everything without criteria', () => {
    expect(problemFilter({})(emptyGroup)).toBe(true);
  });

  it('should combine severity, type and rule criteria', () => {
    const accepts = problemFilter({ severities: ['MEDIUM', 'HIGH'], types: ['GOVERNANCE'], problems: /^QG_/ });

    expect(accepts(tooManyGates)).toBe(true);
    expect(accepts(emptyGroup)).toBe(false);
    expect(problemFilter({ problems: /^QP_/ })(tooManyGates)).toBe(false);
  });
});
