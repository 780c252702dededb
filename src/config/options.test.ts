import { describe, test, expect } from 'vitest';
import { hostToSocketDirectory, optionsToConfig, optionsToDefaultConfig, optionsToPlan } from './options.js';
import { completeCommandLineArgs } from './process.js';
import { permanent, temporary } from './plan.js';

describe('Options To Plan', () => {
  test('should create a database that does not exist yet', () => {
    const plan = optionsToPlan({ database: 'app', user: 'tester', password: 'test-secret' });
    expect(plan.createDbConfig?.commandLine).toEqual({
      keyBased: { '--username=': 'tester' },
      indexBased: { 0: 'app' },
    });
    expect(plan.createDbConfig?.environmentVariables.specific).toEqual({ PGPASSWORD: 'test-secret' });
  });

  test('should skip createdb for databases every cluster has', () => {
    expect(optionsToPlan({ database: 'postgres' }).createDbConfig).toBeUndefined();
    expect(optionsToPlan({ database: 'template1' }).createDbConfig).toBeUndefined();
  });

  test('should create the user with initdb', () => {
    const plan = optionsToPlan({ user: 'tester', password: 'test-secret' });
    expect(plan.initDbConfig?.commandLine.keyBased).toEqual({ '--username=': 'tester' });
    expect(plan.initDbConfig?.environmentVariables.specific).toEqual({ PGPASSWORD: 'test-secret' });
  });

  test('should leave initdb and createdb unset without user or database', () => {
    const plan = optionsToPlan({ host: 'localhost', port: 6000 });
    expect(plan.initDbConfig).toBeUndefined();
    expect(plan.createDbConfig).toBeUndefined();
    expect(plan.postgresPlan.connectionOptions).toEqual({ host: 'localhost', port: 6000 });
  });

  test('should render the createdb command line with the database last', () => {
    const plan = optionsToPlan({ database: 'app', user: 'tester' });
    expect(plan.createDbConfig && completeCommandLineArgs(plan.createDbConfig.commandLine)).toEqual([
      '--username=tester',
      'app',
    ]);
  });
});

describe('Options To Config', () => {
  test('should use an absolute host as the socket directory', () => {
    expect(hostToSocketDirectory('/run/postgresql')).toEqual(permanent('/run/postgresql'));
    expect(hostToSocketDirectory('localhost')).toEqual(temporary());
  });

  test('should carry the port into the config', () => {
    const config = optionsToConfig({ port: 6000, host: '/run/postgresql' });
    expect(config.port).toBe(6000);
    expect(config.socketDirectory).toEqual(permanent('/run/postgresql'));
  });

  test('should layer the options over the defaults', () => {
    const config = optionsToDefaultConfig({ user: 'tester' });
    expect(config.port).toBeNull();
    expect(config.plan.initDbConfig?.environmentVariables.inherit).toBe(true);
    expect(config.plan.initDbConfig?.commandLine.keyBased).toEqual({ '--username=': 'tester' });
  });
});
