/**
 * Call Tracking Tests
 */

import { MemoryStore } from '../../store';
import { countCalls, formatCallArguments, historyKeys, recordHistory } from '../call-tracking';

describe('formatCallArguments', () => {
  it('should render an empty argument list', () => {
    expect(formatCallArguments([])).toBe('()');
  });

  it('should add a trailing comma for a single argument', () => {
    expect(formatCallArguments(['foo'])).toBe("('foo',)");
    expect(formatCallArguments([3.5])).toBe('(3.5,)');
  });

  it('should separate several arguments', () => {
    expect(formatCallArguments(['a', 1])).toBe("('a', 1)");
  });

  it('should switch to double quotes for text holding only single quotes', () => {
    expect(formatCallArguments(["it's"])).toBe('("it\'s",)');
  });

  it('should escape single quotes when both quote kinds appear', () => {
    expect(formatCallArguments(['it\'s "x"'])).toBe("('it\\'s \"x\"',)");
  });

  it('should escape backslashes in text', () => {
    expect(formatCallArguments(['a\\b'])).toBe("('a\\\\b',)");
  });

  it('should escape control characters so each call stays on one line', () => {
    expect(formatCallArguments(['a\nb'])).toBe("('a\\nb',)");
    expect(formatCallArguments(['\r\t'])).toBe("('\\r\\t',)");
    expect(formatCallArguments(['bell\u0007'])).toBe("('bell\\x07',)");
    expect(formatCallArguments(['del\u007f'])).toBe("('del\\x7f',)");
  });

  it('should keep printable non-ASCII text as is', () => {
    expect(formatCallArguments(['héllo'])).toBe("('héllo',)");
  });

  it('should mark bytes with a b prefix', () => {
    expect(formatCallArguments([Buffer.from('ab')])).toBe("(b'ab',)");
  });

  it('should hex-escape bytes outside printable ASCII', () => {
    expect(formatCallArguments([Buffer.from([0x61, 0x00, 0xff, 0x0a])])).toBe("(b'a\\x00\\xff\\n',)");
    expect(formatCallArguments([Buffer.from("it's")])).toBe('(b"it\'s",)');
  });
});

describe('historyKeys', () => {
  it('should derive list keys from the operation name', () => {
    expect(historyKeys('Cache.store')).toEqual({
      inputs: 'Cache.store:inputs',
      outputs: 'Cache.store:outputs',
    });
  });
});

describe('countCalls', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should increment the counter before the operation runs', async () => {
    const operation = jest.fn(async () => (await store.get('op'))?.toString('utf8'));
    const counted = countCalls(store, 'op', operation);

    expect(await counted()).toBe('1');
    expect(await counted()).toBe('2');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should pass arguments through and return the result', async () => {
    const counted = countCalls(store, 'add', async (a: number, b: number) => a + b);
    expect(await counted(2, 3)).toBe(5);
  });

  it('should count calls that fail', async () => {
    const counted = countCalls(store, 'fails', async () => {
      throw new Error('boom');
    });

    await expect(counted()).rejects.toThrow('boom');
    expect((await store.get('fails'))?.toString()).toBe('1');
  });
});

describe('recordHistory', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it('should record inputs and outputs in call order', async () => {
    const recorded = recordHistory(store, 'upper', async (text: string) => text.toUpperCase());

    await recorded('x');
    await recorded('y');

    expect(await store.readListRange('upper:inputs', 0, -1)).toEqual(["('x',)", "('y',)"]);
    expect(await store.readListRange('upper:outputs', 0, -1)).toEqual(['X', 'Y']);
  });

  it('should store outputs in their string form', async () => {
    const recorded = recordHistory(store, 'answer', async () => 42);
    await recorded();

    expect(await store.readListRange('answer:inputs', 0, -1)).toEqual(['()']);
    expect(await store.readListRange('answer:outputs', 0, -1)).toEqual(['42']);
  });

  it('should append the input before the operation runs', async () => {
    const recorded = recordHistory(store, 'peek', async () => store.readListRange('peek:inputs', 0, -1));
    expect(await recorded()).toEqual(['()']);
  });

  it('should not record an output when the operation throws', async () => {
    const recorded = recordHistory(store, 'broken', async (value: string) => {
      throw new Error(`cannot handle ${value}`);
    });

    await expect(recorded('z')).rejects.toThrow('cannot handle z');
    expect(await store.readListRange('broken:inputs', 0, -1)).toEqual(["('z',)"]);
    expect(await store.readListRange('broken:outputs', 0, -1)).toEqual([]);
  });
});
