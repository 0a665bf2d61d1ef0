import { describe, it, expect } from 'vitest';
import { deriveStatus } from '../../src/engine/status.js';

describe('deriveStatus', () => {
  it('Scenario D - fact がなければ trusted の注釈があっても unknown', () => {
    expect(deriveStatus(undefined, { riskLevel: 'trusted' })).toBe('unknown');
  });

  it('Scenario E - active で注釈がなければ suspicious', () => {
    expect(deriveStatus({ state: 'active' }, undefined)).toBe('suspicious');
  });

  it('fact も注釈もなければ unknown', () => {
    expect(deriveStatus(undefined, undefined)).toBe('unknown');
  });

  it.each([
    ['trusted', 'healthy'],
    ['expected', 'healthy'],
    ['suspicious', 'suspicious'],
  ] as const)('active で riskLevel=%s なら %s', (riskLevel, expected) => {
    expect(deriveStatus({ state: 'active' }, { riskLevel })).toBe(expected);
  });

  it('disappeared なら注釈に関係なく ghost', () => {
    expect(deriveStatus({ state: 'disappeared' }, undefined)).toBe('ghost');
    expect(deriveStatus({ state: 'disappeared' }, { riskLevel: 'trusted' })).toBe('ghost');
    expect(deriveStatus({ state: 'disappeared' }, { riskLevel: 'suspicious' })).toBe('ghost');
  });
});
