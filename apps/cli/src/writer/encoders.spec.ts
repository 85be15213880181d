import { csvEncoder, escapeCsvField, indentContinuation, jsonArrayEncoder, jsonObjectEncoder, RecordEncoder } from './encoders';

function encodeAll<T>(encoder: RecordEncoder<T>, records: readonly T[]): string {
  return encoder.header() + records.map((r, i) => encoder.encode(r, i)).join('') + encoder.footer(records.length);
}

describe('escapeCsvField', () => {
  it('should leave plain fields alone', () => {
    expect(escapeCsvField('plain text')).toBe('plain text');
  });

  it('should quote fields holding the separator, quotes or line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
    expect(escapeCsvField('a;b', ';')).toBe('"a;b"');
    expect(escapeCsvField('a,b', ';')).toBe('a,b');
  });
});

describe('csvEncoder', () => {
  it('should write a title row then one row per record', () => {
    const encoder = csvEncoder<{ id: string; label: string }>([
      { title: 'Id', value: (r) => r.id },
      { title: 'Label', value: (r) => r.label },
    ]);

    expect(encodeAll(encoder, [{ id: '1', label: 'one' }, { id: '2', label: 'x,y' }])).toBe('Id,Label\n1,one\n2,"x,y"\n');
  });
});

describe('jsonArrayEncoder', () => {
  it('should produce a valid array whatever the record count', () => {
    expect(encodeAll(jsonArrayEncoder(), [])).toBe('[\n]\n');
    expect(JSON.parse(encodeAll(jsonArrayEncoder(), []))).toEqual([]);
    expect(encodeAll(jsonArrayEncoder(), [{ a: 1 }, { a: 2 }])).toBe('[\n  {"a":1},\n  {"a":2}\n]\n');
  });
});

describe('jsonObjectEncoder', () => {
  it('should write pretty printed members at the requested depth', () => {
    const text = encodeAll(jsonObjectEncoder(1), [
      { key: 'devs', value: { description: 'Developers' } },
      { key: 'ops', value: {} },
    ]);

    expect(text).toBe('{\n    "devs": {\n      "description": "Developers"\n    },\n    "ops": {}\n  }');
    expect(JSON.parse(text)).toEqual({ devs: { description: 'Developers' }, ops: {} });
  });

  it('should write an empty object without members', () => {
    expect(encodeAll(jsonObjectEncoder(1), [])).toBe('{\n  }');
  });
});

describe('indentContinuation', () => {
  it('should indent every line but the first', () => {
    expect(indentContinuation('a\nb\nc', '  ')).toBe('a\n  b\n  c');
  });
});
