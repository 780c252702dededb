import { describe, test, expect } from 'vitest';
import {
  DEFAULT_CONNECTION_TIMEOUT,
  combineConfigs,
  combineDirectoryType,
  combinePlan,
  completePlan,
  defaultConfig,
  emptyConfig,
  emptyPlan,
  generatePlan,
  mergePlans,
  permanent,
  socketDirectoryToConfig,
  temporary,
} from './plan.js';
import { emptyProcessConfig, silentProcessConfig, standardProcessConfig } from './process.js';
import type { Config, Environment, Plan } from './types.js';
import { defaultPlanLogger } from '../utils/logger.js';

const env: Environment = [['PATH', '/bin']];

function generated(makeCreateDb = false): Plan {
  return generatePlan({
    makeInitDb: true,
    makeCreateDb,
    port: 5433,
    socketDirectory: '/tmp/s',
    dataDirectory: '/tmp/d',
  });
}

describe('Directory Type Combination', () => {
  test('should prefer a permanent directory on either side', () => {
    expect(combineDirectoryType(temporary(), temporary())).toEqual(temporary());
    expect(combineDirectoryType(permanent('/a'), temporary())).toEqual(permanent('/a'));
    expect(combineDirectoryType(temporary(), permanent('/b'))).toEqual(permanent('/b'));
    expect(combineDirectoryType(permanent('/a'), permanent('/b'))).toEqual(permanent('/b'));
  });
});

describe('Plan Combination', () => {
  test('should have the empty plan as identity', () => {
    const plan = generated();
    expect(combinePlan(emptyPlan(), plan)).toEqual(plan);
    expect(combinePlan(plan, emptyPlan())).toEqual(plan);
  });

  test('should append config file lines', () => {
    const left: Plan = { ...emptyPlan(), postgresConfigFile: ['a = 1'] };
    const right: Plan = { ...emptyPlan(), postgresConfigFile: ['b = 2'] };
    expect(combinePlan(left, right).postgresConfigFile).toEqual(['a = 1', 'b = 2']);
  });

  test('should merge optional sub-configs field by field', () => {
    const left: Plan = { ...emptyPlan(), initDbConfig: standardProcessConfig() };
    const right: Plan = { ...emptyPlan(), initDbConfig: { ...emptyProcessConfig(), stdOut: 'ignore' } };
    expect(combinePlan(left, right).initDbConfig).toEqual({ ...standardProcessConfig(), stdOut: 'ignore' });
  });

  test('should let an explicit null cache setting override a set one', () => {
    const left: Plan = { ...emptyPlan(), initDbCache: { enabled: true, directory: '/cache' } };
    const right: Plan = { ...emptyPlan(), initDbCache: null };
    expect(combinePlan(left, right).initDbCache).toBeNull();
  });
});

describe('Plan Generation', () => {
  test('should bind postgres to loopback with its socket in the given directory', () => {
    expect(socketDirectoryToConfig('/tmp/s')).toEqual([
      "listen_addresses = '127.0.0.1, ::1'",
      "unix_socket_directories = '/tmp/s'",
    ]);
  });

  test('should produce a plan that completes without further input', () => {
    const result = completePlan(env, mergePlans(generated(), emptyPlan()));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const plan = result.value;
    expect(plan.postgresPlan.postgresConfig.commandLine).toEqual(['-D /tmp/d', '-p 5433']);
    expect(plan.postgresPlan.postgresConfig.environmentVariables).toEqual([['PATH', '/bin']]);
    expect(plan.postgresPlan.connectionOptions).toEqual({ host: '/tmp/s', port: 5433, database: 'postgres' });
    expect(plan.initDbConfig?.commandLine).toEqual(['--pgdata=/tmp/d']);
    expect(plan.createDbConfig).toBeUndefined();
    expect(plan.postgresConfigFile).toBe(
      "listen_addresses = '127.0.0.1, ::1'\nunix_socket_directories = '/tmp/s'\n"
    );
    expect(plan.dataDirectory).toBe('/tmp/d');
    expect(plan.connectionTimeout).toBe(DEFAULT_CONNECTION_TIMEOUT);
    expect(plan.initDbCache).toBeNull();
    expect(plan.logger).toBe(defaultPlanLogger);
  });

  test('should point createdb at the socket directory and port', () => {
    const result = completePlan(env, generated(true));
    expect(result.ok && result.value.createDbConfig?.commandLine).toEqual(['-h /tmp/s', '-p 5433']);
  });

  test('should let the caller plan override generated values', () => {
    const override: Plan = {
      ...emptyPlan(),
      postgresPlan: {
        postgresConfig: {
          ...silentProcessConfig(),
          commandLine: { keyBased: { '-p ': '6000' }, indexBased: {} },
        },
        connectionOptions: { database: 'app' },
      },
      postgresConfigFile: ['fsync = off'],
      connectionTimeout: 5000000,
    };
    const result = completePlan(env, mergePlans(generated(), override));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.postgresPlan.postgresConfig.commandLine).toEqual(['-D /tmp/d', '-p 6000']);
    expect(result.value.postgresPlan.postgresConfig.stdOut).toBe('ignore');
    expect(result.value.postgresPlan.connectionOptions).toEqual({ host: '/tmp/s', port: 5433, database: 'app' });
    expect(result.value.postgresConfigFile.endsWith("'/tmp/s'\nfsync = off\n")).toBe(true);
    expect(result.value.connectionTimeout).toBe(5000000);
  });
});

describe('Plan Completion', () => {
  test('should report every missing option with its context', () => {
    expect(completePlan(env, emptyPlan())).toEqual({
      ok: false,
      errors: [
        'Missing logger option',
        'postgresPlan: postgresConfig: Missing inherit option',
        'postgresPlan: postgresConfig: Missing stdIn option',
        'postgresPlan: postgresConfig: Missing stdOut option',
        'postgresPlan: postgresConfig: Missing stdErr option',
        'Missing dataDirectoryString option',
        'Missing connectionTimeout option',
        'Missing initDbCache option',
      ],
    });
  });

  test('should prefix errors of an incomplete createdb config', () => {
    const plan: Plan = { ...generated(), createDbConfig: { ...standardProcessConfig(), stdErr: undefined } };
    expect(completePlan(env, plan)).toEqual({
      ok: false,
      errors: ['createDbConfig: Missing stdErr option'],
    });
  });
});

describe('Config Combination', () => {
  test('should request a free port and run initdb by default', () => {
    const config = defaultConfig();
    expect(config.port).toBeNull();
    expect(config.plan.initDbConfig).toEqual(standardProcessConfig());
    expect(config.plan.createDbConfig).toBeUndefined();
  });

  test('should fold layers left to right', () => {
    const file: Config = { ...emptyConfig(), port: 6000, dataDirectory: permanent('/srv/data') };
    const overrides: Config = { ...emptyConfig(), port: 7000, temporaryDirectory: '/scratch' };
    const config = combineConfigs(defaultConfig(), file, overrides);
    expect(config.port).toBe(7000);
    expect(config.dataDirectory).toEqual(permanent('/srv/data'));
    expect(config.socketDirectory).toEqual(temporary());
    expect(config.temporaryDirectory).toBe('/scratch');
  });

  test('should group layers either way with the same result', () => {
    const a: Config = { ...emptyConfig(), port: 6000 };
    const b: Config = { ...emptyConfig(), socketDirectory: permanent('/run/pg') };
    const c: Config = { ...emptyConfig(), port: null };
    expect(combineConfigs(combineConfigs(a, b), c)).toEqual(combineConfigs(a, combineConfigs(b, c)));
  });
});
