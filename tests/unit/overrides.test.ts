#!/usr/bin/env node

/**
 * Unit tests for overrides.ts
 *
 * - Command line override forms (--name=value, --name value, name:=value, name=value)
 * - BRINGUP_ARG_* environment overrides
 * - Coercion to the declared default's type
 */

import {
  buildOverrideMap,
  coerceValue,
  overridesFromEnv,
  parseOverrideArgs,
} from '../../src/overrides.js';
import { InvalidOverrideError } from '../../src/errors.js';
import { param } from '../../src/types.js';

describe('parseOverrideArgs', () => {
  it('should accept --name=value', () => {
    expect(parseOverrideArgs(['--robot_ip=192.0.2.5'])).toEqual([
      { name: 'robot_ip', value: '192.0.2.5', origin: 'cli' },
    ]);
  });

  it('should accept --name value', () => {
    expect(parseOverrideArgs(['--robot_type', 'gen3', '--prefix=left_'])).toEqual([
      { name: 'robot_type', value: 'gen3', origin: 'cli' },
      { name: 'prefix', value: 'left_', origin: 'cli' },
    ]);
  });

  it('should accept name:=value and name=value', () => {
    expect(parseOverrideArgs(['robot_ip:=192.0.2.5', 'gripper=none'])).toEqual([
      { name: 'robot_ip', value: '192.0.2.5', origin: 'cli' },
      { name: 'gripper', value: 'none', origin: 'cli' },
    ]);
  });

  it('should keep everything after the first separator in the value', () => {
    expect(parseOverrideArgs(['--description_file=arm=v2.xacro'])).toEqual([
      { name: 'description_file', value: 'arm=v2.xacro', origin: 'cli' },
    ]);
  });

  it('should allow an empty value', () => {
    expect(parseOverrideArgs(['prefix:='])).toEqual([
      { name: 'prefix', value: '', origin: 'cli' },
    ]);
  });

  it('should skip a bare -- separator', () => {
    expect(parseOverrideArgs(['--robot_type=gen3', '--', 'robot_ip:=192.0.2.5'])).toEqual([
      { name: 'robot_type', value: 'gen3', origin: 'cli' },
      { name: 'robot_ip', value: '192.0.2.5', origin: 'cli' },
    ]);
  });

  it('should reject a flag without a value', () => {
    expect(() => parseOverrideArgs(['--robot_ip'])).toThrow("Missing value for override '--robot_ip'");
    expect(() => parseOverrideArgs(['--robot_ip', '--prefix=x'])).toThrow("Missing value for override '--robot_ip'");
  });

  it('should reject a bare word', () => {
    expect(() => parseOverrideArgs(['gen3'])).toThrow(
      "Unrecognized override 'gen3' (expected --name=value or name:=value)"
    );
  });

  it('should reject an invalid name', () => {
    expect(() => parseOverrideArgs(['--=x'])).toThrow("Invalid parameter name in '--=x'");
  });
});

describe('overridesFromEnv', () => {
  it('should map prefixed variables to lowercase parameter names', () => {
    const env = {
      BRINGUP_ARG_ROBOT_IP: '192.0.2.5',
      BRINGUP_ARG_USE_FAKE_HARDWARE: 'true',
      PATH: '/usr/bin',
      BRINGUP_ARG_: 'ignored',
    };

    expect(overridesFromEnv(env, 'BRINGUP_ARG_')).toEqual([
      { name: 'robot_ip', value: '192.0.2.5', origin: 'env' },
      { name: 'use_fake_hardware', value: 'true', origin: 'env' },
    ]);
  });
});

describe('coerceValue', () => {
  it('should keep strings for string and required declarations', () => {
    expect(coerceValue('42', param('prefix', 'Prefix', ''))).toBe('42');
    expect(coerceValue('42', param('robot_ip', 'Address'))).toBe('42');
    expect(coerceValue('42', undefined)).toBe('42');
  });

  it('should parse booleans for boolean defaults', () => {
    const decl = param('use_fake_hardware', 'Fake hardware', false);

    expect(coerceValue('true', decl)).toBe(true);
    expect(coerceValue('FALSE', decl)).toBe(false);
    expect(() => coerceValue('yes', decl)).toThrow(InvalidOverrideError);
  });

  it('should parse numbers for numeric defaults', () => {
    const decl = param('update_rate', 'Rate', 1000);

    expect(coerceValue('500', decl)).toBe(500);
    expect(coerceValue('0.5', decl)).toBe(0.5);
    expect(() => coerceValue('fast', decl)).toThrow(
      "Invalid value 'fast' for parameter 'update_rate': expected a number"
    );
    expect(() => coerceValue(' ', decl)).toThrow(InvalidOverrideError);
  });
});

describe('buildOverrideMap', () => {
  const declarations = new Map([
    ['robot_ip', param('robot_ip', 'Address')],
    ['use_fake_hardware', param('use_fake_hardware', 'Fake hardware', false)],
  ]);

  it('should let later sources win', () => {
    const map = buildOverrideMap(
      [
        [{ name: 'robot_ip', value: '10.0.0.1', origin: 'env' }],
        [{ name: 'robot_ip', value: '192.0.2.5', origin: 'cli' }],
      ],
      name => declarations.get(name)
    );

    expect(map.get('robot_ip')).toBe('192.0.2.5');
  });

  it('should coerce by declaration and keep unknown names as strings', () => {
    const map = buildOverrideMap(
      [[
        { name: 'use_fake_hardware', value: 'true', origin: 'cli' },
        { name: 'speed', value: '3', origin: 'cli' },
      ]],
      name => declarations.get(name)
    );

    expect([...map]).toEqual([
      ['use_fake_hardware', true],
      ['speed', '3'],
    ]);
  });
});
