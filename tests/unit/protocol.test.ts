import { PassThrough } from 'stream';
import { ACK_TOKEN, loginFrame, messageFrame, readLines } from '../../src/relay/protocol';

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('frames', () => {
  test('login, message and ack frames are newline-terminated', () => {
    expect(loginFrame(100)).toBe('LOGIN:100\n');
    expect(messageFrame(100, 'hello world')).toBe('MESSAGE:100 hello world\n');
    expect(ACK_TOKEN).toBe('ACK:MESSAGE\n');
  });

  test('message payload is passed through untouched', () => {
    expect(messageFrame(7, 'MESSAGE:1 spoof')).toBe('MESSAGE:7 MESSAGE:1 spoof\n');
    expect(messageFrame(7, '')).toBe('MESSAGE:7 \n');
  });
});

describe('readLines', () => {
  test('splits on \\n, strips \\r and keeps empty lines', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.write('first\nsec');
    input.write('ond\r\n\nthird\n');
    input.end();

    await expect(result).resolves.toEqual(['first', 'second', '', 'third']);
  });

  test('a trailing fragment without a newline is still a line', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.end('a\nb');

    await expect(result).resolves.toEqual(['a', 'b']);
  });

  test('decodes multi-byte characters split across chunks', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));
    const bytes = Buffer.from('héllo\n', 'utf8');

    input.write(bytes.subarray(0, 2));
    input.end(bytes.subarray(2));

    await expect(result).resolves.toEqual(['héllo']);
  });

  test('a carriage return not followed by a newline is payload', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.end('a\rb\n\r\nc\td\r\r\n');

    await expect(result).resolves.toEqual(['a\rb', '', 'c\td\r']);
  });

  test('invalid UTF-8 rejects the read', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.end(Buffer.from([0x61, 0xff, 0x62, 0x0a]));

    await expect(result).rejects.toThrow('not valid for encoding utf-8');
  });

  test('a multi-byte character cut off by end of stream rejects the read', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.end(Buffer.from('é', 'utf8').subarray(0, 1));

    await expect(result).rejects.toThrow('not valid for encoding utf-8');
  });

  test('a stream error surfaces as a rejected read', async () => {
    const input = new PassThrough();
    const result = collect(readLines(input));

    input.destroy(new Error('ECONNRESET'));

    await expect(result).rejects.toThrow('ECONNRESET');
  });
});
