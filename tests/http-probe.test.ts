/**
 * Tests for the HTTP prober
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { HttpProber, identifyServer } from '../src/core/http-probe.js';
import { PortRangeError } from '../src/core/errors.js';
import { headerValue, probeUrl } from '../src/utils/http.js';
import { createPacerSpy, createRecordingSink, systemError } from './helpers.js';

describe('identifyServer', () => {
  it.each([
    ['nginx/1.18', 'Nginx'],
    ['Apache/2.4.41 (Ubuntu)', 'Apache'],
    ['Microsoft-IIS/10.0', 'Microsoft IIS'],
    ['lighttpd/1.4.59', 'Lighttpd'],
    ['gunicorn', 'Gunicorn'],
    ['Caddy', 'Caddy'],
    ['CustomThing/2.0', 'Customthing'],
  ])('should map %s to %s', (header, family) => {
    expect(identifyServer(header)).toBe(family);
  });

  it('should return Unknown for a missing or blank header', () => {
    expect(identifyServer(undefined)).toBe('Unknown');
    expect(identifyServer('')).toBe('Unknown');
    expect(identifyServer('   ')).toBe('Unknown');
  });
});

describe('http utilities', () => {
  it('should look headers up case-insensitively', () => {
    expect(headerValue({ Server: 'nginx' }, 'server')).toBe('nginx');
    expect(headerValue({ 'set-cookie': ['a=1', 'b=2'] }, 'Set-Cookie')).toBe('a=1, b=2');
    expect(headerValue({}, 'server')).toBeUndefined();
  });

  it('should bracket IPv6 literals in probe URLs', () => {
    expect(probeUrl('127.0.0.1', 8080)).toBe('http://127.0.0.1:8080/');
    expect(probeUrl('::1', 80)).toBe('http://[::1]:80/');
    expect(probeUrl('example.test', 443)).toBe('http://example.test:443/');
  });
});

describe('HttpProber', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should report an open port with server family and content type', async () => {
    mockAgent
      .get('http://127.0.0.1:8080')
      .intercept({ path: '/', method: 'GET' })
      .reply(200, 'hello', {
        headers: { server: 'nginx/1.18', 'content-type': 'text/html; charset=utf-8' },
      });

    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [8080]);

    expect(result.open_ports).toEqual([8080]);
    expect(result.scan_results).toEqual([
      {
        port: 8080,
        status: 'open',
        status_code: 200,
        server: 'Nginx',
        content_type: 'text/html; charset=utf-8',
        url: 'http://127.0.0.1:8080/',
      },
    ]);
  });

  it('should treat redirects as open without following them', async () => {
    mockAgent
      .get('http://127.0.0.1:8888')
      .intercept({ path: '/', method: 'GET' })
      .reply(301, '', { headers: { location: 'https://127.0.0.1/' } });

    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [8888]);

    expect(result.scan_results[0]).toMatchObject({ status: 'open', status_code: 301 });
  });

  it('should mark 4xx and 5xx responses closed', async () => {
    const pool = mockAgent.get('http://127.0.0.1:8000');
    pool.intercept({ path: '/', method: 'GET' }).reply(404, 'missing', {
      headers: { server: 'Apache/2.4.41 (Ubuntu)' },
    });

    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [8000]);

    expect(result.open_ports).toEqual([]);
    expect(result.scan_results).toEqual([
      {
        port: 8000,
        status: 'closed',
        status_code: 404,
        server: 'Apache',
        content_type: 'Unknown',
        url: 'http://127.0.0.1:8000/',
      },
    ]);
  });

  it('should record a connection failure with a truncated message', async () => {
    mockAgent
      .get('http://127.0.0.1:8081')
      .intercept({ path: '/', method: 'GET' })
      .replyWithError(
        systemError('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:8081 (os error 111)')
      );

    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [8081]);

    expect(result.scan_results).toEqual([
      {
        port: 8081,
        status: 'closed',
        server: 'N/A',
        url: 'http://127.0.0.1:8081/',
        error: 'connect ECONNREFUSED 127.0.0.1:8081',
      },
    ]);
  });

  it('should fold dispatcher failures into closed records', async () => {
    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [9999]);

    expect(result.scan_results[0]).toMatchObject({ port: 9999, status: 'closed', server: 'N/A' });
    expect(result.scan_results[0].error).toBeTruthy();
  });

  it('should keep the requested port order when running sequentially', async () => {
    mockAgent
      .get('http://127.0.0.1:3000')
      .intercept({ path: '/', method: 'GET' })
      .reply(200, 'ok');
    mockAgent
      .get('http://127.0.0.1:2000')
      .intercept({ path: '/', method: 'GET' })
      .reply(200, 'ok');

    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });
    const result = await prober.scan('127.0.0.1', [3000, 2000]);

    expect(result.open_ports).toEqual([3000, 2000]);
    expect(result.scan_results.map((r) => r.port)).toEqual([3000, 2000]);
  });

  it('should sort a mixed list by port under concurrency and pace each request', async () => {
    mockAgent
      .get('http://127.0.0.1:3000')
      .intercept({ path: '/', method: 'GET' })
      .reply(200, '{}', { headers: { 'content-type': 'application/json' } });
    mockAgent
      .get('http://127.0.0.1:2000')
      .intercept({ path: '/', method: 'GET' })
      .reply(200, 'ok', { headers: { server: 'Caddy' } });

    const { pacer, wait } = createPacerSpy();
    const prober = new HttpProber({
      dispatcher: mockAgent,
      pacer,
      concurrency: 2,
      sink: createRecordingSink(),
    });
    const result = await prober.scan('127.0.0.1', [3000, 2000]);

    expect(result.open_ports).toEqual([2000, 3000]);
    expect(result.scan_results.map((r) => r.server)).toEqual(['Caddy', 'Unknown']);
    expect(result.scan_results[1].content_type).toBe('application/json');
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('should reject ports outside 1-65535', async () => {
    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });

    await expect(prober.scan('127.0.0.1', [80, 70000])).rejects.toThrow(PortRangeError);
  });

  it('should return an empty result for an empty port list', async () => {
    const prober = new HttpProber({ dispatcher: mockAgent, sink: createRecordingSink() });

    await expect(prober.scan('127.0.0.1', [])).resolves.toEqual({
      open_ports: [],
      scan_results: [],
    });
  });
});
