import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import {
  extensionOf,
  resolvePath,
  substitutePlaceholders,
  withSuffix,
} from '../../../src/deploy/PathResolver.js';

describe('PathResolver', () => {
  describe('substitutePlaceholders', () => {
    it('should replace every occurrence of a known key', () => {
      expect(substitutePlaceholders('[[www]]/js/[[www]].txt', { www: '/srv/site' })).toBe(
        '/srv/site/js//srv/site.txt'
      );
    });

    it('should leave unknown placeholders untouched', () => {
      expect(substitutePlaceholders('[[www]]/[[other]]/a.js', { www: 'site' })).toBe('site/[[other]]/a.js');
    });

    it('should not touch partial delimiters', () => {
      expect(substitutePlaceholders('[www]/[[www]/www]]', { www: 'site' })).toBe('[www]/[[www]/www]]');
    });

    it('should apply keys in map order', () => {
      expect(substitutePlaceholders('[[a]]', { a: '[[b]]', b: 'done' })).toBe('done');
      expect(substitutePlaceholders('[[b]][[a]]', { b: 'x', a: '[[b]]' })).toBe('x[[b]]');
    });

    it('should return the name unchanged for an empty map', () => {
      expect(substitutePlaceholders('src/[[www]]', {})).toBe('src/[[www]]');
    });
  });

  describe('extensionOf', () => {
    it('should take everything after the first dot', () => {
      expect(extensionOf('foo.min.js')).toBe('min.js');
      expect(extensionOf('index.html')).toBe('html');
    });

    it('should treat dotfiles as all extension', () => {
      expect(extensionOf('.htaccess')).toBe('htaccess');
    });

    it('should return empty string without a dot', () => {
      expect(extensionOf('Makefile')).toBe('');
    });
  });

  describe('resolvePath', () => {
    it('should resolve relative names against the base directory', () => {
      const resolved = resolvePath('js/app.min.js', '/work/unit');
      expect(resolved).toEqual({
        absolutePath: '/work/unit/js/app.min.js',
        containingDirectory: '/work/unit/js',
        baseName: 'app.min.js',
        extension: 'min.js',
      });
    });

    it('should let absolute names ignore the base directory', () => {
      expect(resolvePath('/var/www/html/index.php', '/work/unit').absolutePath).toBe('/var/www/html/index.php');
    });

    it('should normalize .. segments', () => {
      expect(resolvePath('a/../../outside.txt', '/work/unit').absolutePath).toBe('/work/outside.txt');
    });

    it('should substitute before joining', () => {
      const resolved = resolvePath('[[www]]/nowcast/index.html', '/work/unit', { www: '/var/www/html' });
      expect(resolved.absolutePath).toBe('/var/www/html/nowcast/index.html');
      expect(resolved.containingDirectory).toBe('/var/www/html/nowcast');
    });

    it('should resolve against the working directory without a base', () => {
      expect(resolvePath('some/file.txt').absolutePath).toBe(path.resolve('some/file.txt'));
    });

    it('should return a frozen value', () => {
      const resolved = resolvePath('a.txt', '/work');
      expect(Object.isFrozen(resolved)).toBe(true);
    });
  });

  describe('withSuffix', () => {
    it('should name a sibling with the suffix appended', () => {
      const derived = withSuffix(resolvePath('style.css', '/work'), '__header');
      expect(derived.absolutePath).toBe('/work/style.css__header');
      expect(derived.extension).toBe('css__header');
    });
  });
});
