import { describe, expect, it, vi } from 'vitest';
import { REDACTED, Redactor } from './redactor.ts';

describe('Redactor', () => {
  const redactor = new Redactor({
    API_KEY: 'test-api-key-1',
    DB_PASSWORD: 'test-secret',
    REGION: 'eu-west-1',
  });

  it('masks secret values inside text', () => {
    expect(redactor.redact('key=test-api-key-1 pass=test-secret')).toBe(
      `key=${REDACTED} pass=${REDACTED}`
    );
  });

  it('keeps short values under non-sensitive keys', () => {
    // REGION is 9 characters and its key is not sensitive
    expect(redactor.redact('region eu-west-1')).toBe('region eu-west-1');
  });

  it('masks sensitive keys from six characters', () => {
    const short = new Redactor({ TOKEN: 'abc', SECRET: 'sixsix' });
    expect(short.redact('abc sixsix')).toBe(`abc ${REDACTED}`);
  });

  it('masks the longer of two overlapping secrets whole', () => {
    const overlapping = new Redactor({ A_TOKEN: 'test-secret', B_TOKEN: 'test-secret-long' });
    expect(overlapping.redact('v=test-secret-long')).toBe(`v=${REDACTED}`);
  });

  it('escapes regex characters', () => {
    const special = new Redactor({ SECRET: 'a.b*c+d?e' });
    expect(special.redact('x a.b*c+d?e y axbbc')).toBe(`x ${REDACTED} y axbbc`);
  });

  it('redacts nested values and leaves non-strings alone', () => {
    expect(
      redactor.redactValue({ list: ['test-secret', 1, null], nested: { v: 'test-api-key-1' } })
    ).toEqual({ list: [REDACTED, 1, null], nested: { v: REDACTED } });
  });

  it('skips common values and reports sensitive keys holding them', () => {
    const onCommonValue = vi.fn();
    const common = new Redactor({ PASSWORD: 'default' }, { onCommonValue });
    expect(common.secretCount).toBe(0);
    expect(onCommonValue).toHaveBeenCalledWith('PASSWORD');
  });

  it('always masks forced secrets', () => {
    const forced = new Redactor({}, { forcedSecrets: ['xy'] });
    expect(forced.redact('xyz')).toBe(`${REDACTED}z`);
  });
});

describe('Redactor sealing', () => {
  const sealer = new Redactor({ token: 'test-secret' }, { forcedSecrets: ['test-secret', 'xy'] });

  it('names the secret in the mask', () => {
    expect(sealer.seal('Bearer test-secret')).toBe('Bearer ***REDACTED:token***');
  });

  it('uses the plain mask for forced values without a name', () => {
    expect(sealer.seal('xyz')).toBe(`${REDACTED}z`);
  });

  it('restores sealed values from the secrets', () => {
    const sealed = sealer.sealValue({ auth: ['Bearer test-secret'], count: 1 });
    expect(sealed).toEqual({ auth: ['Bearer ***REDACTED:token***'], count: 1 });
    expect(Redactor.revealValue(sealed, { token: 'test-secret' })).toEqual({
      auth: ['Bearer test-secret'],
      count: 1,
    });
  });

  it('refuses to restore a secret that was not supplied', () => {
    expect(() => Redactor.reveal('Bearer ***REDACTED:token***', {})).toThrow(
      'Secret "token" is required to restore a redacted value'
    );
  });

  it('leaves text without sealed masks unchanged', () => {
    expect(Redactor.reveal(`log ${REDACTED}`, {})).toBe(`log ${REDACTED}`);
  });
});
