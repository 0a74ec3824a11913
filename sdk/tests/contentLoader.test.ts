import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ContentLoader,
  DEFAULT_GATEWAYS,
  extractCid,
  formatUri,
  orderGateways,
} from '../src/modules/contentLoader';
import { isLosslessNumber } from 'lossless-json';
import {
  CancelledError,
  ContentNotFoundError,
  HttpStatusError,
  StorageError,
  ValidationError,
} from '../src/types/errors';
import { FAST_RETRY, mockFetch, requestedUrls, silenceLogs, stalledResponse, textResponse } from './setup';
import { canonicalJsonStringify } from '../src/utils/canonicalize';

const GATEWAYS = ['https://g1.test/ipfs', 'https://g2.test/ipfs', 'https://g3.test/ipfs'];

describe('content URIs', () => {
  test('formatUri and extractCid are inverses', () => {
    expect(formatUri('QmAbc')).toBe('ipfs://QmAbc');
    expect(extractCid('ipfs://QmAbc')).toBe('QmAbc');
    expect(extractCid(formatUri('QmAbc'))).toBe('QmAbc');
  });

  test('extractCid leaves bare CIDs alone and strips one prefix only', () => {
    expect(extractCid('QmAbc')).toBe('QmAbc');
    expect(extractCid('ipfs://ipfs://QmAbc')).toBe('ipfs://QmAbc');
  });

  test('orderGateways puts the preferred gateway first without duplicates', () => {
    expect(orderGateways('https://g2.test/ipfs/', GATEWAYS)).toEqual([
      'https://g2.test/ipfs',
      'https://g1.test/ipfs',
      'https://g3.test/ipfs',
    ]);
    expect(orderGateways(undefined, GATEWAYS)).toEqual(GATEWAYS);
  });
});

describe('ContentLoader', () => {
  const originalFetch = global.fetch;
  const originalGateway = process.env.IPFS_GATEWAY_URL;

  beforeEach(() => {
    silenceLogs();
    delete process.env.IPFS_GATEWAY_URL;
  });

  afterEach(() => {
    global.fetch = originalFetch;
    if (originalGateway === undefined) {
      delete process.env.IPFS_GATEWAY_URL;
    } else {
      process.env.IPFS_GATEWAY_URL = originalGateway;
    }
    jest.restoreAllMocks();
  });

  test('uses the public gateways by default', () => {
    expect(new ContentLoader().gatewayUrls()).toEqual([...DEFAULT_GATEWAYS]);
  });

  test('prefers IPFS_GATEWAY_URL when no gateway is passed', () => {
    process.env.IPFS_GATEWAY_URL = 'https://custom.test/ipfs/';

    const loader = new ContentLoader({ gateways: GATEWAYS });

    expect(loader.gatewayUrls()).toEqual(['https://custom.test/ipfs', ...GATEWAYS]);
  });

  test('an explicit preferred gateway wins over the environment', () => {
    process.env.IPFS_GATEWAY_URL = 'https://custom.test/ipfs';

    const loader = new ContentLoader({ gateways: GATEWAYS, preferredGateway: 'https://g3.test/ipfs' });

    expect(loader.gatewayUrls()).toEqual(['https://g3.test/ipfs', 'https://g1.test/ipfs', 'https://g2.test/ipfs']);
  });

  test('rejects an empty gateway list', () => {
    expect(() => new ContentLoader({ gateways: [] })).toThrow(StorageError);
  });

  test('falls through gateways in order, retrying each one', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async (input) =>
      String(input).startsWith('https://g3.test')
        ? textResponse('{"ok":true}')
        : textResponse('', 503)
    );
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    await expect(loader.load('ipfs://QmDoc')).resolves.toBe('{"ok":true}');

    expect(requestedUrls(fetchMock)).toEqual([
      'https://g1.test/ipfs/QmDoc',
      'https://g1.test/ipfs/QmDoc',
      'https://g2.test/ipfs/QmDoc',
      'https://g2.test/ipfs/QmDoc',
      'https://g3.test/ipfs/QmDoc',
    ]);
  });

  test('returns from the first gateway that answers', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async () => textResponse('hello'));
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    await expect(loader.load('ipfs://QmDoc')).resolves.toBe('hello');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('reports the last gateway error when every gateway fails', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async () => textResponse('', 404));
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    const failure = await loader.load('ipfs://QmMissing').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StorageError);
    expect(failure).toMatchObject({
      code: 'STORAGE_ERROR',
      message: 'All content gateways failed: Request to https://g3.test/ipfs/QmMissing failed with HTTP 404',
      context: { cid: 'QmMissing', gateways: GATEWAYS },
    });
    expect(failure instanceof Error && failure.cause).toBeInstanceOf(HttpStatusError);
    // 404 is not retried
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test('reads file:// URIs from disk', async () => {
    const fetchMock = mockFetch();
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'content-loader-'));
    const file = path.join(dir, 'doc.json');
    fs.writeFileSync(file, '{"a":1,"b":2}');

    try {
      const loader = new ContentLoader({ gateways: GATEWAYS });

      await expect(loader.load(`file://${file}`)).resolves.toBe('{"a":1,"b":2}');
      await expect(loader.loadJson(`file://${file}`)).resolves.toEqual({ a: 1, b: 2 });
      expect(fetchMock).not.toHaveBeenCalled();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('a missing file is not found, never retried or fetched', async () => {
    const fetchMock = mockFetch();
    const missing = path.join(os.tmpdir(), 'content-loader-missing', 'nothing.json');
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    const failure = await loader.load(`file://${missing}`).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ContentNotFoundError);
    expect(failure).toMatchObject({ code: 'CONTENT_NOT_FOUND', message: `File not found: ${missing}` });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('retries http(s) URIs against the same URL', async () => {
    const fetchMock = mockFetch();
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(textResponse('remote'));
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    await expect(loader.load('https://files.test/doc')).resolves.toBe('remote');
    expect(requestedUrls(fetchMock)).toEqual(['https://files.test/doc', 'https://files.test/doc']);
  });

  test('http(s) failures propagate unchanged', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async () => textResponse('', 404));
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    await expect(loader.load('https://files.test/doc')).rejects.toBeInstanceOf(HttpStatusError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('returns inline content unchanged', async () => {
    const fetchMock = mockFetch();
    const loader = new ContentLoader({ gateways: GATEWAYS });

    await expect(loader.load('{"inline":true}')).resolves.toBe('{"inline":true}');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  test('loadDocument keeps numbers exactly as written', async () => {
    const loader = new ContentLoader({ gateways: GATEWAYS });

    const doc = await loader.loadDocument('{"score":1.0,"big":12345678901234567891}');

    expect(canonicalJsonStringify(doc)).toBe('{"big":12345678901234567891,"score":1.0}');
    // plain parsing rewrites the number
    expect(canonicalJsonStringify(await loader.loadJson('{"score":1.0}'))).toBe('{"score":1}');
  });

  test('loadDocument parses numbers as LosslessNumber', async () => {
    const loader = new ContentLoader({ gateways: GATEWAYS });

    const doc = await loader.loadDocument('{"n":[1e400]}');

    expect(doc).toEqual({ n: [expect.anything()] });
    expect(canonicalJsonStringify(doc)).toBe('{"n":[1e400]}');
    const list = typeof doc === 'object' && doc !== null && 'n' in doc ? doc.n : undefined;
    expect(Array.isArray(list) && isLosslessNumber(list[0])).toBe(true);
  });

  test('loadDocument rejects content that is not JSON', async () => {
    const loader = new ContentLoader({ gateways: GATEWAYS });

    await expect(loader.loadDocument('{"a":')).rejects.toThrow('Content at {"a": is not valid JSON');
  });

  test('a gateway that stalls mid-body times out and the next gateway is tried', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async (input) =>
      String(input).startsWith('https://g1.test') ? stalledResponse() : textResponse('from g2')
    );
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY, timeoutMs: 100 });

    await expect(loader.load('ipfs://QmDoc')).resolves.toBe('from g2');

    expect(requestedUrls(fetchMock)).toEqual([
      'https://g1.test/ipfs/QmDoc',
      'https://g1.test/ipfs/QmDoc',
      'https://g2.test/ipfs/QmDoc',
    ]);
  });

  test('cancelling during a stalled body read stops the load', async () => {
    const fetchMock = mockFetch();
    fetchMock.mockImplementation(async () => stalledResponse());
    const controller = new AbortController();
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY, timeoutMs: 10000 });
    setTimeout(() => controller.abort(), 50);

    const started = Date.now();
    await expect(loader.load('ipfs://QmDoc', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);

    expect(Date.now() - started).toBeLessThan(5000);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('loadJson rejects content that is not JSON', async () => {
    const loader = new ContentLoader({ gateways: GATEWAYS });

    await expect(loader.loadJson('not json')).rejects.toThrow(ValidationError);
  });

  test('stops before fetching once cancelled', async () => {
    const fetchMock = mockFetch();
    const controller = new AbortController();
    controller.abort();
    const loader = new ContentLoader({ gateways: GATEWAYS, retryPolicy: FAST_RETRY });

    await expect(loader.load('ipfs://QmDoc', { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
