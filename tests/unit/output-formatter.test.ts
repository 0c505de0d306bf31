#!/usr/bin/env node

/**
 * Unit tests for output-formatter.ts
 *
 * - text, json and raw compose output
 * - text, json and raw launch output
 * - Parameter listing for --help and params
 */

import {
  buildComposeResult,
  buildLaunchResult,
  formatComposeResult,
  formatLaunchResult,
  formatParameterUsage,
  parameterUsageToJson,
  parseOutputFormat,
} from '../../src/output-formatter.js';
import { describeParameters } from '../../src/assembler.js';
import { ParameterSchema } from '../../src/parameter-schema.js';
import { ArgumentBinding, Composition, LaunchHandle, OutputFormat, ParameterValue, param } from '../../src/types.js';

const common = ParameterSchema.declare([
  param('ip', 'Robot address'),
  param('prefix', 'Joint name prefix', ''),
], 'common');
const viz = ParameterSchema.declare([param('viz', 'Visualization', false)], 'viz');

const composition: Composition = {
  name: 'demo',
  targets: [
    {
      name: 'A',
      schemas: [common, viz],
      forced: new Map([['viz', true]]),
      launch: { command: ['ros2', 'launch', 'pkg', 'a.launch.py'] },
    },
    { name: 'B', schemas: [common, viz], forced: new Map([['viz', false]]) },
  ],
};

const bindings = new Map<string, ArgumentBinding>([
  ['A', new Map<string, ParameterValue>([['ip', '192.0.2.5'], ['prefix', ''], ['viz', true]])],
  ['B', new Map<string, ParameterValue>([['ip', '192.0.2.5'], ['prefix', ''], ['viz', false]])],
]);

describe('parseOutputFormat', () => {
  it('should default to text and accept known formats', () => {
    expect(parseOutputFormat(undefined)).toBe(OutputFormat.Text);
    expect(parseOutputFormat('json')).toBe(OutputFormat.Json);
    expect(parseOutputFormat('raw')).toBe(OutputFormat.Raw);
  });

  it('should reject unknown formats', () => {
    expect(() => parseOutputFormat('yaml')).toThrow("Unknown output format 'yaml' (expected text, json or raw)");
  });
});

describe('buildComposeResult', () => {
  it('should list targets in composition order with their arguments', () => {
    expect(buildComposeResult(composition, bindings)).toEqual({
      schema_version: '1.0',
      composition: 'demo',
      targets: [
        {
          name: 'A',
          command: ['ros2', 'launch', 'pkg', 'a.launch.py'],
          arguments: { ip: '192.0.2.5', prefix: '', viz: true },
        },
        {
          name: 'B',
          command: undefined,
          arguments: { ip: '192.0.2.5', prefix: '', viz: false },
        },
      ],
    });
  });
});

describe('formatComposeResult', () => {
  const result = buildComposeResult(composition, bindings);

  it('should align names in text format', () => {
    expect(formatComposeResult(result, OutputFormat.Text)).toBe([
      'Composition: demo',
      '',
      '[A]',
      '  ip     = 192.0.2.5',
      '  prefix = ""',
      '  viz    = true',
      '',
      '[B]',
      '  ip     = 192.0.2.5',
      '  prefix = ""',
      '  viz    = false',
    ].join('\n'));
  });

  it('should print one command line per target in raw format', () => {
    expect(formatComposeResult(result, OutputFormat.Raw)).toBe([
      'ros2 launch pkg a.launch.py ip:=192.0.2.5 prefix:="" viz:=true',
      'B ip:=192.0.2.5 prefix:="" viz:=false',
    ].join('\n'));
  });

  it('should print parseable JSON', () => {
    const parsed: unknown = JSON.parse(formatComposeResult(result, OutputFormat.Json));

    expect(parsed).toEqual({
      schema_version: '1.0',
      composition: 'demo',
      targets: [
        {
          name: 'A',
          command: ['ros2', 'launch', 'pkg', 'a.launch.py'],
          arguments: { ip: '192.0.2.5', prefix: '', viz: true },
        },
        { name: 'B', arguments: { ip: '192.0.2.5', prefix: '', viz: false } },
      ],
    });
  });
});

describe('formatLaunchResult', () => {
  const handle = (target: string, command: string[], pid?: number): LaunchHandle => ({
    id: `${target}-id`,
    target,
    pid,
    command,
    exited: Promise.resolve({ target, exitCode: 0, success: true }),
    stop: () => undefined,
  });

  const handles = [
    handle('A', ['ros2', 'launch', 'pkg', 'a.launch.py', 'viz:=true'], 4321),
    handle('B', ['ros2', 'launch', 'pkg', 'b.launch.py', 'viz:=false']),
  ];

  it('should show each target with its pid and command in text format', () => {
    expect(formatLaunchResult(buildLaunchResult(composition, handles, false), OutputFormat.Text)).toBe([
      'Composition: demo',
      '',
      '[A] pid 4321',
      '  ros2 launch pkg a.launch.py viz:=true',
      '',
      '[B]',
      '  ros2 launch pkg b.launch.py viz:=false',
    ].join('\n'));
  });

  it('should mark dry runs', () => {
    const text = formatLaunchResult(buildLaunchResult(composition, [], true), OutputFormat.Text);

    expect(text).toBe('Composition: demo (dry run)');
  });

  it('should print only the command lines in raw format', () => {
    expect(formatLaunchResult(buildLaunchResult(composition, handles, true), OutputFormat.Raw)).toBe([
      'ros2 launch pkg a.launch.py viz:=true',
      'ros2 launch pkg b.launch.py viz:=false',
    ].join('\n'));
  });

  it('should print parseable JSON', () => {
    const parsed: unknown = JSON.parse(formatLaunchResult(buildLaunchResult(composition, handles, false), OutputFormat.Json));

    expect(parsed).toEqual({
      schema_version: '1.0',
      composition: 'demo',
      dry_run: false,
      targets: [
        { name: 'A', id: 'A-id', pid: 4321, command: ['ros2', 'launch', 'pkg', 'a.launch.py', 'viz:=true'] },
        { name: 'B', id: 'B-id', command: ['ros2', 'launch', 'pkg', 'b.launch.py', 'viz:=false'] },
      ],
    });
  });
});

describe('formatParameterUsage', () => {
  const usages = describeParameters(composition.targets);

  it('should show defaults, targets and fixed values', () => {
    expect(formatParameterUsage(usages)).toBe([
      'Parameters (--name=value or name:=value):',
      '',
      '  ip  (default: <required>)',
      '      Robot address',
      '      targets: A, B',
      '',
      '  prefix  (default: "")',
      '      Joint name prefix',
      '      targets: A, B',
      '',
      '  viz  (default: false)',
      '      Visualization',
      '      targets: A, B',
      '      fixed to true for A',
      '      fixed to false for B',
    ].join('\n'));
  });

  it('should render JSON with required flags', () => {
    const parsed: unknown = JSON.parse(parameterUsageToJson(usages));

    expect(parsed).toEqual([
      { name: 'ip', description: 'Robot address', required: true, default: null, targets: ['A', 'B'], forced: {} },
      { name: 'prefix', description: 'Joint name prefix', required: false, default: '', targets: ['A', 'B'], forced: {} },
      { name: 'viz', description: 'Visualization', required: false, default: false, targets: ['A', 'B'], forced: { A: true, B: false } },
    ]);
  });
});
