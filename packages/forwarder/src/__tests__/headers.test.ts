import {describe, expect, it} from 'vitest';

import {buildOutboundHeaders, collectResponseHeaders, stripHopByHopHeaders} from '../index';

describe('stripHopByHopHeaders', () => {
  it('removes hop-by-hop headers and Connection-nominated headers', () => {
    const stripped = stripHopByHopHeaders([
      {name: 'Connection', value: 'Keep-Alive, X-Remove-Me'},
      {name: 'Keep-Alive', value: 'timeout=5'},
      {name: 'X-Remove-Me', value: '1'},
      {name: 'X-Keep-Me', value: 'ok'}
    ]);

    expect(stripped).toEqual({ok: true, value: [{name: 'x-keep-me', value: 'ok'}]});
  });

  it('fails closed for invalid Connection tokens', () => {
    const stripped = stripHopByHopHeaders([{name: 'Connection', value: 'x-valid, bad token'}]);

    expect(stripped.ok).toBe(false);
    if (stripped.ok) {
      return;
    }

    expect(stripped.error.code).toBe('invalid_connection_header');
  });

  it('rejects header values containing line breaks', () => {
    const stripped = stripHopByHopHeaders([{name: 'Accept', value: 'a\r\nInjected: 1'}]);

    expect(stripped.ok).toBe(false);
    if (stripped.ok) {
      return;
    }

    expect(stripped.error.code).toBe('invalid_header_value');
  });
});

describe('buildOutboundHeaders', () => {
  it('drops client-owned headers and sets the configured user agent', () => {
    const built = buildOutboundHeaders({
      callerHeaders: [
        {name: 'Accept', value: 'application/java-archive'},
        {name: 'If-None-Match', value: '"abc"'},
        {name: 'Host', value: 'proxy.local'},
        {name: 'User-Agent', value: 'Maven/3.9'},
        {name: 'Transfer-Encoding', value: 'chunked'}
      ],
      userAgent: 'artifact-proxy/1.0'
    });

    expect(built).toEqual({
      ok: true,
      value: {
        accept: 'application/java-archive',
        'if-none-match': '"abc"',
        'user-agent': 'artifact-proxy/1.0'
      }
    });
  });
});

describe('collectResponseHeaders', () => {
  it('lowercases names and drops hop-by-hop and cookie headers', () => {
    const collected = collectResponseHeaders([
      ['Content-Type', 'application/java-archive'],
      ['Connection', 'keep-alive'],
      ['Set-Cookie', 'session=test'],
      ['ETag', '"v1"']
    ]);

    expect(collected).toEqual({
      'content-type': 'application/java-archive',
      etag: '"v1"'
    });
  });
});
