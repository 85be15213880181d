import { encodeParams, extractErrorMessage, HttpTransport } from './transport';
import {
  ApiError,
  AuthenticationError,
  ObjectNotFoundError,
  PermissionDeniedError,
  RateLimitedError,
  TransportError,
} from './errors';

function reply(status: number, body: string): Response {
  return new Response(body, { status });
}

describe('encodeParams', () => {
  it('should drop undefined values and stringify the rest', () => {
    const encoded = encodeParams({ q: 'a b', p: 2, flag: true, missing: undefined });
    expect(encoded.toString()).toBe('q=a+b&p=2&flag=true');
  });
});

describe('extractErrorMessage', () => {
  it('should join the server error messages', () => {
    const body = JSON.stringify({ errors: [{ msg: 'first' }, { msg: 'second' }] });
    expect(extractErrorMessage(body, 'fallback')).toBe('first, second');
  });

  it('should fall back when the body is not JSON', () => {
    expect(extractErrorMessage('<html>', 'fallback')).toBe('fallback');
  });
});

describe('HttpTransport', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should send GET parameters in the query string with token authentication', async () => {
    fetchSpy.mockResolvedValue(reply(200, '{"ok":true}'));
    const transport = new HttpTransport({ url: 'http://localhost:9000/', token: 'test-secret', userAgent: 'sqconf/test' });

    const response = await transport.request('GET', 'projects/search', { q: 'demo', p: 1 });

    expect(response).toEqual({ status: 200, body: '{"ok":true}' });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://localhost:9000/api/projects/search?q=demo&p=1');
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: `Basic ${Buffer.from('test-secret:').toString('base64')}`,
      'User-Agent': 'sqconf/test',
    });
  });

  it('should send POST parameters form encoded', async () => {
    fetchSpy.mockResolvedValue(reply(200, ''));
    const transport = new HttpTransport({ url: 'http://localhost:9000' });

    await transport.request('POST', 'user_groups/create', { name: 'devs' });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('http://localhost:9000/api/user_groups/create');
    expect(init?.body).toBe('name=devs');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  });

  it.each([
    [401, AuthenticationError],
    [403, PermissionDeniedError],
    [404, ObjectNotFoundError],
    [429, RateLimitedError],
    [500, ApiError],
  ])('should map HTTP %i to %p', async (status, errorClass) => {
    fetchSpy.mockResolvedValue(reply(status, JSON.stringify({ errors: [{ msg: 'server says no' }] })));
    const transport = new HttpTransport({ url: 'http://localhost:9000' });

    const failure = transport.request('GET', 'system/status');
    await expect(failure).rejects.toBeInstanceOf(errorClass);
    await expect(failure).rejects.toThrow('server says no');
  });

  it('should wrap network failures in TransportError', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));
    const transport = new HttpTransport({ url: 'http://localhost:9000' });

    await expect(transport.request('GET', 'system/status')).rejects.toThrow(
      new TransportError('GET http://localhost:9000/api/system/status failed: fetch failed')
    );
  });
});
