import { describe, it, expect, afterEach } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CLONE_TIMEOUT_MS,
  getDeploySettings,
  loadDeploySettings,
  resetDeploySettings,
} from '../../../src/deploy/config.js';
import { selectPlacementStrategy } from '../../../src/deploy/actions/placement.js';
import { resolvePath } from '../../../src/deploy/PathResolver.js';

describe('DeploySettings', () => {
  afterEach(() => {
    resetDeploySettings();
  });

  it('should fall back to defaults', () => {
    expect(loadDeploySettings({})).toEqual({
      configFileName: 'deploy.json',
      exportsDir: path.resolve('exports'),
      stagingDir: '/common',
      privilegedRoots: ['/var/www/html/'],
      privilegedUser: 'webadmin',
      workRoot: path.resolve(os.tmpdir()),
      gitBaseUrl: 'https://github.com',
      cloneTimeoutMs: DEFAULT_CLONE_TIMEOUT_MS,
      coffeeCommand: 'coffee',
      uglifyCommand: 'uglifyjs',
    });
  });

  it('should read overrides from the environment', () => {
    const settings = loadDeploySettings({
      DEPLOY_CONFIG_FILE: 'deploy.prod.json',
      DEPLOY_EXPORTS_DIR: '/srv/exports',
      DEPLOY_PRIVILEGED_ROOTS: '/var/www/html/, /srv/www/ ,',
      DEPLOY_PRIVILEGED_USER: 'www-data',
      DEPLOY_GIT_BASE_URL: 'https://git.example.org//',
      DEPLOY_CLONE_TIMEOUT: '120000',
    });

    expect(settings.configFileName).toBe('deploy.prod.json');
    expect(settings.exportsDir).toBe('/srv/exports');
    expect(settings.privilegedRoots).toEqual(['/var/www/html/', '/srv/www/']);
    expect(settings.privilegedUser).toBe('www-data');
    expect(settings.gitBaseUrl).toBe('https://git.example.org');
    expect(settings.cloneTimeoutMs).toBe(120000);
  });

  it('should end every privileged root with a separator', () => {
    const settings = loadDeploySettings({ DEPLOY_PRIVILEGED_ROOTS: '/var/www/html,/srv/www/' });
    expect(settings.privilegedRoots).toEqual(['/var/www/html/', '/srv/www/']);
    expect(selectPlacementStrategy(resolvePath('/var/www/html2/index.php'), settings.privilegedRoots)).toBe('direct');
    expect(selectPlacementStrategy(resolvePath('/var/www/html/index.php'), settings.privilegedRoots)).toBe('privileged');
  });

  it('should allow an empty privileged root list', () => {
    expect(loadDeploySettings({ DEPLOY_PRIVILEGED_ROOTS: '' }).privilegedRoots).toEqual([]);
  });

  it('should ignore a timeout that is not a positive number', () => {
    expect(loadDeploySettings({ DEPLOY_CLONE_TIMEOUT: 'soon' }).cloneTimeoutMs).toBe(DEFAULT_CLONE_TIMEOUT_MS);
    expect(loadDeploySettings({ DEPLOY_CLONE_TIMEOUT: '-5' }).cloneTimeoutMs).toBe(DEFAULT_CLONE_TIMEOUT_MS);
  });

  it('should cache process settings until reset', () => {
    const first = getDeploySettings();
    expect(getDeploySettings()).toBe(first);
    resetDeploySettings();
    expect(getDeploySettings()).not.toBe(first);
  });
});
