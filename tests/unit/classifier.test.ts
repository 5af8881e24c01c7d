import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  Classifier,
  MISC_CODE,
  Taxonomy,
  loadTaxonomy,
  resolveComponentCode,
  resolveProjectCode,
} from '../../src/lib/classifier';

describe('Classifier', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('resolveProjectCode', () => {
    it('should match a known repository exactly', () => {
      expect(resolveProjectCode('v-ics-le')).toBe('VICS');
      expect(resolveProjectCode('godot-modelica-rust-integration')).toBe('GODOT');
    });

    it('should strip the owner prefix', () => {
      expect(resolveProjectCode('someone/modelica-rust-ffi')).toBe('FFI');
    });

    it('should match a repository containing a known name', () => {
      expect(resolveProjectCode('someone/lunaco-sim-v2')).toBe('LUNACO');
    });

    it('should use table order when the name is part of several keys', () => {
      // "colony" is part of space-colony-modelica-core, godot-colony-sim and colony-sim-framework
      expect(resolveProjectCode('colony')).toBe('MODELICA');
    });

    it('should return MISC and warn for unknown repositories', () => {
      expect(resolveProjectCode('totally-unknown-repo')).toBe(MISC_CODE);
      expect(warnSpy).toHaveBeenCalled();
      expect(warnSpy.mock.calls[0][0]).toContain('totally-unknown-repo');
    });

    it('should not warn for known repositories', () => {
      resolveProjectCode('owner/v-ics-le');
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should treat a trailing slash as unknown', () => {
      expect(resolveProjectCode('someone/')).toBe(MISC_CODE);
    });
  });

  describe('resolveComponentCode', () => {
    it('should use the first label that has a component', () => {
      expect(resolveComponentCode(['rust', 'networking'])).toBe('RUST');
      expect(resolveComponentCode(['networking', 'rust'])).toBe('NET');
    });

    it('should skip labels without a component', () => {
      expect(resolveComponentCode(['good first issue', 'modbus', 'testing'])).toBe('PROTO');
    });

    it('should normalize case and whitespace', () => {
      expect(resolveComponentCode(['  Testing  '])).toBe('TEST');
      expect(resolveComponentCode(['FRONTEND'])).toBe('VIZ');
    });

    it('should fall back to keywords inside labels', () => {
      expect(resolveComponentCode(['godot-plugin'])).toBe('GODOT');
      expect(resolveComponentCode(['physical-model'])).toBe('MODEL');
      expect(resolveComponentCode(['user-configs'])).toBe('CONFIG');
    });

    it('should apply keyword fallbacks in order', () => {
      expect(resolveComponentCode(['modbus-over-rust'])).toBe('RUST');
    });

    it('should return MISC when nothing matches', () => {
      expect(resolveComponentCode([])).toBe(MISC_CODE);
      expect(resolveComponentCode(['misc-stuff'])).toBe(MISC_CODE);
    });

    it('should be deterministic', () => {
      const labels = ['simulation', 'rust'];
      expect(resolveComponentCode(labels)).toBe(resolveComponentCode([...labels]));
    });
  });

  describe('custom taxonomy', () => {
    const taxonomy: Taxonomy = {
      projects: [
        { match: 'alpha', code: 'ALPHA' },
        { match: 'alpha-tools', code: 'TOOLS' },
      ],
      components: [{ label: 'Docs', code: 'DOC' }],
      heuristics: [{ contains: ['parser'], code: 'PARSE' }],
    };

    it('should use the supplied tables', () => {
      const classifier = new Classifier(taxonomy);

      expect(classifier.resolveProjectCode('org/alpha-tools')).toBe('TOOLS');
      expect(classifier.resolveProjectCode('org/alpha-cli')).toBe('ALPHA');
      expect(classifier.resolveComponentCode(['docs'])).toBe('DOC');
      expect(classifier.resolveComponentCode(['yaml-parser'])).toBe('PARSE');
      expect(classifier.resolveComponentCode(['rust'])).toBe(MISC_CODE);
    });
  });

  describe('loadTaxonomy', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'taxonomy-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should load a valid taxonomy file', () => {
      const file = path.join(tmpDir, 'taxonomy.json');
      fs.writeFileSync(
        file,
        JSON.stringify({
          projects: [{ match: 'beta', code: 'BETA' }],
          components: [],
          heuristics: [],
        })
      );

      const taxonomy = loadTaxonomy(file);

      expect(taxonomy.projects).toEqual([{ match: 'beta', code: 'BETA' }]);
    });

    it('should reject lowercase codes', () => {
      const file = path.join(tmpDir, 'taxonomy.json');
      fs.writeFileSync(
        file,
        JSON.stringify({
          projects: [{ match: 'beta', code: 'beta' }],
          components: [],
          heuristics: [],
        })
      );

      expect(() => loadTaxonomy(file)).toThrow(
        `Invalid taxonomy file ${file}: projects.0.code codes must be uppercase alphanumeric`
      );
    });
  });
});
