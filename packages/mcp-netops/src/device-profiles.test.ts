import { describe, it, expect } from 'vitest';
import { getProfile, knownDeviceTypes } from './device-profiles.js';
import { ConfigurationError } from './errors.js';

describe('device profiles', () => {
  it('knows the supported platforms', () => {
    expect([...knownDeviceTypes()].sort()).toEqual([
      'arista_eos',
      'cisco_ios',
      'cisco_nxos',
      'cisco_xe',
      'juniper_junos',
    ]);
  });

  it('rejects an unknown device_type', () => {
    expect(() => getProfile('hp_procurve')).toThrow(ConfigurationError);
    expect(() => getProfile('hp_procurve')).toThrow(
      'Unknown device_type: hp_procurve. Available: cisco_ios, cisco_xe, cisco_nxos, arista_eos, juniper_junos'
    );
  });

  describe('cisco_ios', () => {
    const ios = getProfile('cisco_ios');

    it('matches exec, privileged and config prompts', () => {
      expect(ios.prompt.test('r1>')).toBe(true);
      expect(ios.prompt.test('r1#')).toBe(true);
      expect(ios.prompt.test('r1(config-if)#')).toBe(true);
      expect(ios.prompt.test('Building configuration...')).toBe(false);
    });

    it('tells privileged from unprivileged', () => {
      expect(ios.privilegedPrompt?.test('r1#')).toBe(true);
      expect(ios.privilegedPrompt?.test('r1>')).toBe(false);
    });

    it('spots rejected config lines', () => {
      const rejected = ios.errorPatterns.some(p => p.test("% Invalid input detected at '^' marker."));
      const accepted = ios.errorPatterns.some(p => p.test('description uplink'));
      expect(rejected).toBe(true);
      expect(accepted).toBe(false);
    });
  });

  it('has no enable step on NX-OS', () => {
    const nxos = getProfile('cisco_nxos');
    expect(nxos.enableCommand).toBeUndefined();
    expect(nxos.saveCommand).toBe('copy running-config startup-config');
  });

  it('commits on leaving Junos config mode', () => {
    const junos = getProfile('juniper_junos');
    expect(junos.prompt.test('netops@r1> ')).toBe(true);
    expect(junos.configExit).toBe('commit and-quit');
    expect(junos.saveCommand).toBeUndefined();
  });
});
