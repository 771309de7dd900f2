/**
 * Input classification tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { gzipSync } from 'zlib';
import { removePath } from '@txrun/core';
import { collectVcfBamArgs, detectFileType, existsOrGz, readFirstLine } from '../fileTypes.js';

const VCF_CONTENT = '##fileformat=VCFv4.2\n#CHROM\tPOS\tID\tREF\tALT\n';

describe('input classification', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'txrun-inputs-'));
  });

  afterEach(async () => {
    await removePath(tempDir);
  });

  describe('detectFileType', () => {
    it('should classify alignments by extension', async () => {
      expect(await detectFileType(path.join(tempDir, 'sample.bam'))).toBe('bam');
      expect(await detectFileType(path.join(tempDir, 'sample.cram'))).toBe('bam');
    });

    it('should classify VCF files by their header line', async () => {
      const vcf = path.join(tempDir, 'calls.vcf');
      await fs.writeFile(vcf, VCF_CONTENT);

      expect(await detectFileType(vcf)).toBe('vcf');
    });

    it('should read compressed VCF files', async () => {
      const vcf = path.join(tempDir, 'calls.vcf.gz');
      await fs.writeFile(vcf, gzipSync(VCF_CONTENT));

      expect(await detectFileType(vcf)).toBe('vcf');
    });

    it('should fall back to the .gz sibling of a missing file', async () => {
      await fs.writeFile(path.join(tempDir, 'calls.vcf.gz'), gzipSync(VCF_CONTENT));

      expect(await detectFileType(path.join(tempDir, 'calls.vcf'))).toBe('vcf');
    });

    it('should treat other text files as lists', async () => {
      const list = path.join(tempDir, 'inputs.txt');
      await fs.writeFile(list, '/data/a.bam\n');

      expect(await detectFileType(list)).toBe('list');
    });
  });

  describe('readFirstLine', () => {
    it('should return an empty string for an empty file', async () => {
      const empty = path.join(tempDir, 'empty.txt');
      await fs.writeFile(empty, '');

      expect(await readFirstLine(empty)).toBe('');
    });
  });

  describe('existsOrGz', () => {
    it('should accept a file or its compressed sibling only', async () => {
      await fs.writeFile(path.join(tempDir, 'plain.txt'), 'x');
      await fs.writeFile(path.join(tempDir, 'packed.txt.gz'), gzipSync('x'));

      expect(await existsOrGz(path.join(tempDir, 'plain.txt'))).toBe(true);
      expect(await existsOrGz(path.join(tempDir, 'packed.txt'))).toBe(true);
      expect(await existsOrGz(path.join(tempDir, 'absent.txt'))).toBe(false);
      expect(await existsOrGz(tempDir)).toBe(false);
    });
  });

  describe('collectVcfBamArgs', () => {
    it('should group inputs by type and report missing ones', async () => {
      const bam = path.join(tempDir, 'sample.bam');
      const vcf = path.join(tempDir, 'calls.vcf');
      const missing = path.join(tempDir, 'absent.vcf');
      await fs.writeFile(bam, 'BAM');
      await fs.writeFile(vcf, VCF_CONTENT);

      expect(await collectVcfBamArgs([bam, vcf, missing])).toEqual({
        bam: [bam],
        vcf: [vcf],
        missing: [missing],
      });
    });

    it('should expand list files recursively, skipping blank lines', async () => {
      const bam1 = path.join(tempDir, 'one.bam');
      const bam2 = path.join(tempDir, 'two.cram');
      const vcf = path.join(tempDir, 'calls.vcf');
      const inner = path.join(tempDir, 'inner.txt');
      const outer = path.join(tempDir, 'outer.txt');
      await fs.writeFile(bam1, 'BAM');
      await fs.writeFile(bam2, 'CRAM');
      await fs.writeFile(vcf, VCF_CONTENT);
      await fs.writeFile(inner, `${bam2}   \n\n${vcf}\n`);
      await fs.writeFile(outer, `${bam1}\n${inner}\n${path.join(tempDir, 'gone.bam')}\n`);

      expect(await collectVcfBamArgs([outer])).toEqual({
        bam: [bam1, bam2],
        vcf: [vcf],
        missing: [path.join(tempDir, 'gone.bam')],
      });
    });

    it('should not loop on list files that include themselves', async () => {
      const bam = path.join(tempDir, 'one.bam');
      const list = path.join(tempDir, 'self.txt');
      await fs.writeFile(bam, 'BAM');
      await fs.writeFile(list, `${list}\n${bam}\n`);

      expect(await collectVcfBamArgs([list])).toEqual({ bam: [bam] });
    });

    it('should return an empty result for no inputs', async () => {
      expect(await collectVcfBamArgs([])).toEqual({});
    });
  });
});
