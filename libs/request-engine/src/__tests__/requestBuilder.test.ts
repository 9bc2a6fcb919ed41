import { describe, expect, it } from 'vitest';
import { BuildError } from '../errors';
import { buildRequest, resolveUrl, withQueryParameter } from '../requestBuilder';
import type { RequestSpec } from '../types';
import { singleUseStream } from './fakes';

const json = { mode: 'json', baseUrl: 'https://api.example.com/v1/' } as const;

describe('resolveUrl', () => {
  it('joins relative paths onto the base URL', () => {
    expect(resolveUrl({ url: '/users' }, 'https://api.example.com/v1/')).toBe('https://api.example.com/v1/users');
    expect(resolveUrl({ url: 'users' }, 'https://api.example.com/v1')).toBe('https://api.example.com/v1/users');
  });

  it('keeps absolute URLs and their existing query', () => {
    const url = resolveUrl(
      { url: 'https://other.example.com/items?sort=asc', query: { page: 2, sort: 'desc', skip: undefined } },
      'https://api.example.com',
    );

    expect(url).toBe('https://other.example.com/items?sort=desc&page=2');
  });

  it('rejects a relative URL without a base', () => {
    expect(() => resolveUrl({ url: '/users' })).toThrow('No baseUrl provided and request url is not absolute: /users');
  });
});

describe('withQueryParameter', () => {
  it('keeps the last value for a repeated key and leaves the original RequestSpec untouched', () => {
    const spec: RequestSpec = { method: 'GET', url: '/items', query: { page: 1 } };

    const next = withQueryParameter(withQueryParameter(spec, 'page', 2), 'page', 3);

    expect(next.query).toEqual({ page: 3 });
    expect(spec.query).toEqual({ page: 1 });
    expect(resolveUrl(next, 'https://api.example.com')).toBe('https://api.example.com/items?page=3');
  });
});

describe('buildRequest', () => {
  it('builds a bodiless JSON request', async () => {
    const built = await buildRequest({ method: 'GET', url: '/users' }, json);

    expect(built.request).toEqual({
      method: 'GET',
      url: 'https://api.example.com/v1/users',
      headers: { accept: 'application/json' },
    });
    expect(built.body.isEmpty).toBe(true);
    expect(built.encoding).toBe('none');
  });

  it('encodes a model with the negotiated codec', async () => {
    const built = await buildRequest(
      { method: 'POST', url: '/items', body: { kind: 'model', model: { name: 'pen' } } },
      json,
    );

    expect(built.request.headers).toEqual({ accept: 'application/json', 'content-type': 'application/json' });
    expect(built.body.text()).toBe('{"name":"pen"}');
    expect(built.encoding).toBe('json');
  });

  it('encodes XML models and advertises XML', async () => {
    const built = await buildRequest(
      { method: 'PUT', url: 'https://api.example.com/items/1', body: { kind: 'model', model: { item: { id: 1 } } } },
      { mode: 'xml' },
    );

    expect(built.request.headers).toEqual({ accept: 'application/xml', 'content-type': 'application/xml' });
    expect(built.body.text()).toBe('<item><id>1</id></item>');
  });

  it('form-encodes a model when asked, whatever the mode', async () => {
    const built = await buildRequest(
      { method: 'POST', url: '/login', body: { kind: 'model', model: { user: 'test', pass: 'test-secret' } }, formEncoded: true },
      json,
    );

    expect(built.request.headers).toEqual({
      accept: 'application/json',
      'content-type': 'application/x-www-form-urlencoded',
    });
    expect(built.body.text()).toBe('user=test&pass=test-secret');
    expect(built.encoding).toBe('form');
  });

  it('sends raw data verbatim without a content type', async () => {
    const built = await buildRequest(
      { method: 'POST', url: '/upload', body: { kind: 'raw', data: singleUseStream('part1,', 'part2') } },
      json,
    );

    expect(built.request.headers).toEqual({ accept: 'application/json' });
    expect(built.body.text()).toBe('part1,part2');
    expect(built.encoding).toBe('raw');
  });

  it('adds no default headers in raw mode', async () => {
    const built = await buildRequest(
      { method: 'POST', url: 'https://api.example.com/echo', body: { kind: 'model', model: 'hello' } },
      { mode: 'raw' },
    );

    expect(built.request.headers).toEqual({});
    expect(built.body.text()).toBe('hello');
  });

  it('lets the overlay replace, add and remove headers', async () => {
    const built = await buildRequest(
      {
        method: 'POST',
        url: '/report',
        body: { kind: 'model', model: { id: 1 } },
        headers: {
          Accept: 'text/csv',
          'X-Trace': ['a', 'b'],
          'Content-Type': [],
        },
      },
      json,
    );

    expect(built.request.headers).toEqual({ accept: 'text/csv', 'x-trace': 'a, b' });
  });

  it('fails to build an unresolvable URL', async () => {
    const pending = buildRequest({ method: 'GET', url: '/users' }, { mode: 'json' });

    await expect(pending).rejects.toBeInstanceOf(BuildError);
    await expect(pending).rejects.toThrow('Invalid request URL: No baseUrl provided and request url is not absolute: /users');
  });

  it('fails to build an unencodable body', async () => {
    const pending = buildRequest(
      { method: 'POST', url: '/items', body: { kind: 'model', model: { id: BigInt(1) } } },
      json,
    );

    await expect(pending).rejects.toBeInstanceOf(BuildError);
    await expect(pending).rejects.toThrow(/^Failed to encode request body: /);
  });

  it('fails to build an invalid header name', async () => {
    const pending = buildRequest({ method: 'GET', url: '/users', headers: { 'bad header': 'x' } }, json);

    await expect(pending).rejects.toThrow(/^Invalid request header: /);
  });
});
