import * as path from 'path';
import { loadDescriptorModel } from '../../src/descriptor/loadDescriptorModel';
import { SchemaCompiler } from '../../src/schema/SchemaCompiler';

const MODEL_PATH = path.join(__dirname, '../../schemas/telemetry.model.json');

describe('telemetry model end to end', () => {
  const model = loadDescriptorModel(MODEL_PATH);
  const compiler = new SchemaCompiler(model);
  const { types, failures } = compiler.compileAll();
  const telemetry = types['Telemetry-Module'];

  const first = {
    id: 7,
    at: '20240501120000Z',
    severity: 'info',
    tags: ['a', 'b'],
    payload: {
      reading: {
        sensor: 't-1',
        value: 21.5,
        unit: 'celsius',
        flags: { data: new Uint8Array([0xa0]), bitLength: 8 },
      },
    },
    origin: '1.3.6.1.4.1',
  };
  const firstWire =
    '{"id":7,"at":"20240501120000Z","tags":["a","b"],' +
    '"payload":{"reading":{"sensor":"t-1","value":21.5,"flags":{"value":"A0","length":8}}},' +
    '"origin":"1.3.6.1.4.1"}';

  const second = { id: 8, at: '20240501120500Z', severity: 'error', payload: { text: 'hello' } };
  const secondWire = '{"id":8,"at":"20240501120500Z","severity":"error","payload":{"text":"hello"}}';

  it('compiles every type', () => {
    expect(failures).toEqual([]);
    expect(Object.keys(types['Common-Types'])).toEqual(['Identifier', 'Timestamp']);
    expect(Object.keys(telemetry)).toEqual(['Severity', 'Reading', 'Payload', 'Event', 'EventChain', 'Batch']);
  });

  it('resolves imported types and named size bounds', () => {
    expect(String(telemetry.Reading)).toBe(
      'Telemetry-Module.Reading ::= SEQUENCE { sensor Common-Types.Identifier, value REAL, ' +
        'unit UTF8String DEFAULT "celsius", flags BIT STRING OPTIONAL }',
    );
    const event = compiler.arena.get(telemetry.Event.root);
    const tags = event.kind === 'SEQUENCE' ? event.fields.find(f => f.name === 'tags') : undefined;
    expect(tags && compiler.arena.get(tags.node)).toMatchObject({ kind: 'SEQUENCE OF', size: { min: 0, max: 8 } });
  });

  it('encodes an event to canonical JER', () => {
    expect(telemetry.Event.encodeToString(first).unwrap()).toBe(firstWire);
    expect(telemetry.Event.encodeToString(second).unwrap()).toBe(secondWire);
  });

  it('decodes an event, filling defaults', () => {
    expect(telemetry.Event.decodeFromString(firstWire).unwrap()).toEqual(first);
    expect(telemetry.Event.decodeFromString(secondWire).unwrap()).toEqual(second);
  });

  it('round-trips a recursive chain', () => {
    const chain = { event: first, next: { event: second } };
    const bytes = telemetry.EventChain.encode(chain).unwrap();
    expect(new TextDecoder().decode(bytes)).toBe(`{"event":${firstWire},"next":{"event":${secondWire}}}`);
    expect(telemetry.EventChain.decode(bytes).unwrap()).toEqual(chain);
  });

  it('round-trips a batch', () => {
    expect(telemetry.Batch.encodeToString([]).unwrap()).toBe('[]');
    expect(telemetry.Batch.decodeFromString(`[${secondWire},${firstWire}]`).unwrap()).toEqual([second, first]);
  });

  it('reports errors with the path of the offending value', () => {
    const twoChoices = telemetry.Event.encode({ ...second, payload: { text: 'x', raw: new Uint8Array([1]) } });
    expect(twoChoices._tag === 'Err' && twoChoices.error.path).toBe('/payload');

    const badSeverity = telemetry.Event.encode({ ...second, severity: 'critical' });
    expect(badSeverity._tag === 'Err' && badSeverity.error.message).toBe(
      "Enumeration value 'critical' not found in [debug, info, warning, error]. (at /severity)",
    );

    const badOid = telemetry.Event.decodeFromString('{"id":1,"at":"x","payload":{"text":""},"origin":"9.1"}');
    expect(badOid._tag === 'Err' && badOid.error.code).toBe('DECODE_ERROR');

    const missingId = telemetry.Event.encode({ at: 'x', payload: { text: '' } });
    expect(missingId._tag === 'Err' && missingId.error.code).toBe('MISSING_REQUIRED_FIELD');
  });
});
