import {describe, expect, it} from 'vitest';

import {createOutboundClient, createSlotPool, forwarderErrorCodes, packageName} from '../index';

describe('packageName', () => {
  it('exports the package name', () => {
    expect(packageName).toBe('forwarder');
  });

  it('exports the client and pool factories', () => {
    expect(typeof createOutboundClient).toBe('function');
    expect(typeof createSlotPool).toBe('function');
    expect(forwarderErrorCodes).toContain('upstream_bad_status');
  });
});
