import * as path from 'path';
import { applyEnvironment, defaultConfig, loadConfig, parseConfig } from '../src/config';
import { ConfigurationError } from '../src/errors';

const fixtures = path.join(__dirname, 'fixtures');

describe('configuration', () => {
  it('defaults to compile and runtime scopes with a table report', () => {
    expect(defaultConfig()).toEqual({ expectedScopes: ['compile', 'runtime'], sboms: [], generators: [], format: 'table' });
    expect(parseConfig(undefined)).toEqual(defaultConfig());
  });

  it('loads a YAML file and resolves paths relative to it', async () => {
    const config = await loadConfig(path.join(fixtures, 'config.yaml'), {});
    expect(config.project).toEqual({ name: 'petstore', version: '1.4.0', pomPath: undefined });
    expect(config.dependencyTree).toBe(path.join(fixtures, 'deptree.txt'));
    expect(config.sboms).toEqual([
      { label: 'syft', path: path.join(fixtures, 'sbom-syft.json') },
      { label: 'cyclonedx', path: path.join(fixtures, 'sbom-cyclonedx.xml') }
    ]);
    expect(config.format).toBe('json');
  });

  it('parses generators', () => {
    const config = parseConfig({
      generators: [{ label: 'syft', command: './bin/syft', args: ['packages', 'dir:.', '-o', 'cyclonedx-json', '--file', '{output}'], output: 'out/syft.json', timeoutMs: 60000 }]
    }, '/work');
    expect(config.generators).toEqual([
      { label: 'syft', command: './bin/syft', args: ['packages', 'dir:.', '-o', 'cyclonedx-json', '--file', '{output}'], output: path.resolve('/work', 'out/syft.json'), timeoutMs: 60000 }
    ]);
  });

  it('accepts scopes as a comma separated string', () => {
    expect(parseConfig({ expectedScopes: 'compile, provided' }).expectedScopes).toEqual(['compile', 'provided']);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig('nope')).toThrow(ConfigurationError);
    expect(() => parseConfig({ sboms: {} })).toThrow('sboms must be a list');
    expect(() => parseConfig({ sboms: [{ label: 'x' }] })).toThrow('sboms[0].path is required');
    expect(() => parseConfig({ expectedScopes: [1] })).toThrow('expectedScopes must be a list of strings');
    expect(() => parseConfig({ format: 'xml' })).toThrow('format must be one of table, json, yaml');
    expect(() => parseConfig({ generators: [{ label: 'a', command: 'b', output: 'c', timeoutMs: -1 }] })).toThrow('generators[0].timeoutMs must be a positive number');
  });

  it('lets SBOM_EVAL_SCOPES override the scopes', () => {
    expect(applyEnvironment(defaultConfig(), { SBOM_EVAL_SCOPES: 'runtime' }).expectedScopes).toEqual(['runtime']);
    expect(applyEnvironment(defaultConfig(), { SBOM_EVAL_SCOPES: ' ' }).expectedScopes).toEqual(['compile', 'runtime']);
  });

  it('reports unreadable config files', async () => {
    await expect(loadConfig(path.join(fixtures, 'missing.yaml'), {})).rejects.toThrow(ConfigurationError);
  });
});
