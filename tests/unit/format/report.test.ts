import { describe, it, expect } from 'vitest';
import { groupByTemplate, locateById } from '../../../src/correlator/index.js';
import { describeFillIssue, executionToJson, queryGroupToJson } from '../../../src/format/report.js';
import { logText } from '../../helpers/fixtures.js';

const TEXT = logText('id=abc sql=SELECT ? , ?', 'id=abc params=[String:2:b][Int:1:1]');

describe('executionToJson', () => {
  it('serializes parameters as a position-ordered array', () => {
    const [execution] = locateById(TEXT, 'abc').executions;
    if (!execution) throw new Error('expected an execution');

    expect(executionToJson(execution)).toEqual({
      id: 'abc',
      sequenceIndex: 1,
      timestamp: null,
      callerName: 'Unknown',
      logger: null,
      template: 'SELECT ? , ?',
      filledSql: "SELECT 1 , 'b'",
      fillIssue: null,
      parameters: [
        { kind: 'integer', typeName: 'Int', position: 1, rawValue: '1' },
        { kind: 'string', typeName: 'String', position: 2, rawValue: 'b' },
      ],
    });
  });

  it('survives a JSON round trip', () => {
    const groups = groupByTemplate(locateById(TEXT, 'abc').executions).map(queryGroupToJson);

    expect(JSON.parse(JSON.stringify(groups))).toEqual(groups);
  });
});

describe('describeFillIssue', () => {
  it('describes each recovered condition', () => {
    expect(describeFillIssue({ kind: 'missing-value', position: 2 }))
      .toBe('Missing parameter value for position 2');
    expect(describeFillIssue({ kind: 'unsupported-type', position: 1, typeName: 'Blob' }))
      .toBe('Unsupported parameter type "Blob" at position 1');
  });
});
