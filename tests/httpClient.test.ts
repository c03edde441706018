/**
 * Tests for Portal HTTP Client
 */
import { PortalHttpClient, encodeForm } from '../logic/portalApi/httpClient';
import { CookieJar } from '../logic/portalApi/cookieJar';

const LOGIN_URL = 'https://monitoring.solaredge.com/solaredge-apigw/api/login';
const PLAYBACK_URL = 'https://monitoring.solaredge.com/solaredge-web/p/playbackData';

let fetchMock: jest.SpiedFunction<typeof fetch>;

function requestInit(call: number): RequestInit {
  const init = fetchMock.mock.calls[call][1];
  if (!init) {
    throw new Error(`fetch call ${call} had no init`);
  }
  return init;
}

function mockResponse(status: number, body: string, setCookies: string[] = [], location?: string): Response {
  return {
    status,
    ok: status >= 200 && status < 300,
    headers: {
      getSetCookie: () => setCookies,
      get: (name: string) => (name.toLowerCase() === 'location' ? location ?? null : null),
    },
    text: jest.fn().mockResolvedValue(body),
  } as unknown as Response;
}

describe('encodeForm', () => {
  test('encodes strings and numbers', () => {
    expect(encodeForm({ fieldId: '123456', timeUnit: 5 })).toBe('fieldId=123456&timeUnit=5');
  });

  test('escapes reserved characters', () => {
    expect(encodeForm({ j_username: 'user@example.com', j_password: 'a&b=c d' })).toBe(
      'j_username=user%40example.com&j_password=a%26b%3Dc+d',
    );
  });
});

describe('PortalHttpClient', () => {
  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  test('sends form requests with timeout and user agent', async () => {
    fetchMock.mockResolvedValue(mockResponse(200, 'ok'));
    const client = new PortalHttpClient();

    const response = await client.request(LOGIN_URL, {
      method: 'POST',
      form: { j_username: 'user@example.com', j_password: 'test-secret' },
      timeoutMs: 10000,
    });

    expect(response.status).toBe(200);
    expect(response.ok).toBe(true);
    await expect(response.text()).resolves.toBe('ok');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      LOGIN_URL,
      expect.objectContaining({
        method: 'POST',
        body: 'j_username=user%40example.com&j_password=test-secret',
        redirect: 'manual',
        signal: expect.any(AbortSignal),
        headers: expect.objectContaining({
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': 'solar-portal-client/1.0',
        }),
      }),
    );
  });

  test('sends GET requests without body or cookie header', async () => {
    fetchMock.mockResolvedValue(mockResponse(200, '{}'));
    const client = new PortalHttpClient();

    await client.request('https://monitoring.solaredge.com/solaredge-apigw/api/sites/1/layout/logical', {
      method: 'GET',
      timeoutMs: 5000,
    });

    const init = requestInit(0);
    expect(init.method).toBe('GET');
    expect(init.body).toBeUndefined();
    expect(init.headers).not.toHaveProperty('Cookie');
    expect(init.headers).not.toHaveProperty('Content-Type');
  });

  test('stores response cookies and sends them on later requests', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse(200, '', [
        'SolarEdge_SSO-1.4=sso-abc; Max-Age=3600; Path=/',
        'CSRF-TOKEN=csrf-123; Path=/',
      ]))
      .mockResolvedValueOnce(mockResponse(200, '{}'));
    const client = new PortalHttpClient();

    await client.request(LOGIN_URL, { method: 'POST', form: {}, timeoutMs: 10000 });
    await client.request(PLAYBACK_URL, {
      method: 'POST',
      headers: { 'X-CSRF-TOKEN': 'csrf-123' },
      form: { fieldId: '1', timeUnit: 4 },
      timeoutMs: 10000,
    });

    expect(client.findCookie('monitoring.solaredge.com', 'CSRF-TOKEN')?.value).toBe('csrf-123');
    expect(client.findCookie('monitoring.solaredge.com', 'SolarEdge_SSO-1.4')?.maxAge).toBe(3600);
    expect(requestInit(1).headers).toEqual(expect.objectContaining({
      'Cookie': 'SolarEdge_SSO-1.4=sso-abc; CSRF-TOKEN=csrf-123',
      'X-CSRF-TOKEN': 'csrf-123',
    }));
  });

  test('shares cookies through an injected jar', async () => {
    const jar = new CookieJar();
    jar.setFromHeaders(LOGIN_URL, ['CSRF-TOKEN=preset']);
    fetchMock.mockResolvedValue(mockResponse(200, ''));
    const client = new PortalHttpClient(jar);

    await client.request(PLAYBACK_URL, { method: 'GET', timeoutMs: 1000 });

    expect(client.cookieJar).toBe(jar);
    expect(requestInit(0).headers).toHaveProperty('Cookie', 'CSRF-TOKEN=preset');
  });

  test('returns error statuses without throwing', async () => {
    fetchMock.mockResolvedValue(mockResponse(403, 'Forbidden'));
    const client = new PortalHttpClient();

    const response = await client.request(LOGIN_URL, { method: 'POST', form: {}, timeoutMs: 1000 });

    expect(response.status).toBe(403);
    expect(response.ok).toBe(false);
    await expect(response.text()).resolves.toBe('Forbidden');
  });

  test('keeps cookies set on a redirect hop', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse(302, '', ['CSRF-TOKEN=tok; Path=/'], '/solaredge-web/p/home'))
      .mockResolvedValueOnce(mockResponse(200, 'home'));
    const client = new PortalHttpClient();

    const response = await client.request(LOGIN_URL, {
      method: 'POST',
      form: { j_username: 'user@example.com', j_password: 'test-secret' },
      timeoutMs: 1000,
    });

    expect(response.status).toBe(200);
    await expect(response.text()).resolves.toBe('home');
    expect(client.findCookie('monitoring.solaredge.com', 'CSRF-TOKEN')?.value).toBe('tok');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe('https://monitoring.solaredge.com/solaredge-web/p/home');
    const init = requestInit(1);
    expect(init.method).toBe('GET');
    expect(init.body).toBeUndefined();
    expect(init.headers).toHaveProperty('Cookie', 'CSRF-TOKEN=tok');
    expect(init.headers).not.toHaveProperty('Content-Type');
  });

  test('keeps method and body on a 307 redirect', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse(307, '', [], PLAYBACK_URL))
      .mockResolvedValueOnce(mockResponse(200, '{}'));
    const client = new PortalHttpClient();

    await client.request(LOGIN_URL, { method: 'POST', form: { fieldId: '1' }, timeoutMs: 1000 });

    const init = requestInit(1);
    expect(fetchMock.mock.calls[1][0]).toBe(PLAYBACK_URL);
    expect(init.method).toBe('POST');
    expect(init.body).toBe('fieldId=1');
    expect(init.headers).toHaveProperty('Content-Type', 'application/x-www-form-urlencoded');
  });

  test('stores each hop\'s cookies against that hop\'s host', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse(302, '', ['a=1'], 'https://sso.example.com/land'))
      .mockResolvedValueOnce(mockResponse(200, '', ['b=2']));
    const client = new PortalHttpClient();

    await client.request(LOGIN_URL, { method: 'GET', timeoutMs: 1000 });

    expect(requestInit(1).headers).not.toHaveProperty('Cookie');
    expect(client.cookieJar.find('monitoring.solaredge.com', 'a')?.value).toBe('1');
    expect(client.cookieJar.find('sso.example.com', 'b')?.value).toBe('2');
    expect(client.cookieJar.find('monitoring.solaredge.com', 'b')).toBeUndefined();
  });

  test('returns a redirect status without Location as the response', async () => {
    fetchMock.mockResolvedValue(mockResponse(302, 'moved'));
    const client = new PortalHttpClient();

    const response = await client.request(LOGIN_URL, { method: 'GET', timeoutMs: 1000 });

    expect(response.status).toBe(302);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('gives up after ten redirects', async () => {
    fetchMock.mockResolvedValue(mockResponse(302, '', [], '/loop'));
    const client = new PortalHttpClient();

    await expect(
      client.request(LOGIN_URL, { method: 'GET', timeoutMs: 1000 }),
    ).rejects.toThrow(`Too many redirects for ${LOGIN_URL}`);
    expect(fetchMock).toHaveBeenCalledTimes(11);
  });

  test('propagates transport errors', async () => {
    const error = new TypeError('fetch failed');
    fetchMock.mockRejectedValue(error);
    const client = new PortalHttpClient();

    await expect(
      client.request(LOGIN_URL, { method: 'POST', form: {}, timeoutMs: 1000 }),
    ).rejects.toBe(error);
  });
});
