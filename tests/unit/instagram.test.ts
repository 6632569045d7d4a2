jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import { InstagramService, splitMessage } from '../../src/services/instagram.service';
import { ServiceError } from '../../src/utils/errors';

const GRAPH_API_URL = 'https://graph.instagram.com/v22.0/me/messages';
const HELLO_BYTES = new Uint8Array([104, 101, 108, 108, 111]);

describe('splitMessage', () => {
  it('should leave short text alone', () => {
    expect(splitMessage('Καλησπέρα ❤️🐼')).toEqual(['Καλησπέρα ❤️🐼']);
  });

  it('should cut at the last space inside the limit', () => {
    expect(splitMessage('aaaa bbbb cccc', 9)).toEqual(['aaaa bbbb', 'cccc']);
  });

  it('should prefer a newline over a space', () => {
    expect(splitMessage('line one\nline two words', 15)).toEqual(['line one', 'line two words']);
  });

  it('should not leave an empty part after a trailing delimiter', () => {
    expect(splitMessage('aaaaaaaaaa\n', 10)).toEqual(['aaaaaaaaaa']);
  });

  it('should hard-cut text without delimiters', () => {
    expect(splitMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('should keep every part within the default limit', () => {
    const text = Array.from({ length: 300 }, (_, i) => `λέξη${i}`).join(' ');

    const parts = splitMessage(text);

    expect(parts.length).toBeGreaterThan(1);
    expect(parts.every((part) => part.length <= 800)).toBe(true);
    expect(parts.join(' ')).toBe(text);
  });

  it('should reject a non-positive limit', () => {
    expect(() => splitMessage('text', 0)).toThrow(RangeError);
  });
});

describe('InstagramService', () => {
  let fetchMock: jest.SpyInstance;
  const service = new InstagramService({ accessToken: 'test-token' });

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should post the message with bearer auth', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ recipient_id: 'user-1', message_id: 'mid.1' })));

    const result = await service.sendMessage('user-1', 'Γεια σας');

    expect(result).toEqual({ recipientId: 'user-1', messageId: 'mid.1' });
    expect(fetchMock).toHaveBeenCalledWith(
      GRAPH_API_URL,
      expect.objectContaining({
        method: 'POST',
        headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
        body: JSON.stringify({ recipient: { id: 'user-1' }, message: { text: 'Γεια σας' } }),
      })
    );
  });

  it('should mark server errors retryable', async () => {
    fetchMock.mockResolvedValue(new Response('boom', { status: 500 }));

    const error = await service.sendMessage('user-1', 'hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ message: 'Instagram.sendMessage failed: HTTP 500: boom', retryable: true });
  });

  it('should mark client errors permanent', async () => {
    fetchMock.mockResolvedValue(new Response('bad recipient', { status: 400 }));

    await expect(service.sendMessage('user-1', 'hi')).rejects.toMatchObject({ retryable: false });
  });

  it('should wrap network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(service.sendMessage('user-1', 'hi')).rejects.toMatchObject({
      message: 'Instagram.sendMessage failed: fetch failed',
      retryable: true,
    });
  });

  it('should send long replies in order', async () => {
    fetchMock.mockImplementation(async () => new Response(JSON.stringify({ message_id: 'mid' })));
    const text = `${'α'.repeat(500)}\n${'β'.repeat(500)}`;

    const results = await service.sendLongMessage('user-1', text);

    expect(results).toHaveLength(2);
    const bodies = fetchMock.mock.calls.map(([, init]) => JSON.parse(init.body).message.text);
    expect(bodies).toEqual(['α'.repeat(500), 'β'.repeat(500)]);
  });

  it('should download attachments as base64 with their content type', async () => {
    fetchMock.mockResolvedValue(new Response(HELLO_BYTES, { headers: { 'content-type': 'image/png; charset=binary' } }));

    expect(await service.downloadAttachment('https://cdn.example.test/a.png')).toEqual({
      base64: 'aGVsbG8=',
      mimeType: 'image/png',
    });
  });

  it('should assume JPEG without a content type', async () => {
    fetchMock.mockResolvedValue(new Response(HELLO_BYTES));

    expect(await service.downloadAttachment('https://cdn.example.test/a')).toEqual({
      base64: 'aGVsbG8=',
      mimeType: 'image/jpeg',
    });
  });
});
