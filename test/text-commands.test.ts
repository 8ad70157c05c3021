import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { createSandbox, type Sandbox } from './helpers/sandbox';

describe('text commands', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    sandbox.writeFile('/fruit.txt', 'pear\napple\npear\nfig\n');
    sandbox.writeFile('/table.txt', 'name qty\napple 3\nkiwi 12\n');
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  const stdout = async (line: string) => (await sandbox.run(line)).stdout;

  describe('whole-file transforms', () => {
    it.each([
      ['sort fruit.txt', 'apple\nfig\npear\npear'],
      ['uniq fruit.txt', 'pear\napple\nfig'],
      ['nl fruit.txt', '1\tpear\n2\tapple\n3\tpear\n4\tfig'],
      ['rev fruit.txt', 'raep\nelppa\nraep\ngif'],
      ['tac fruit.txt', 'fig\npear\napple\npear'],
      ['column table.txt', 'name  qty\napple 3\nkiwi  12'],
    ])('%s', async (line, expected) => {
      expect(await stdout(line)).toBe(expected);
    });

    it('should convert tabs', async () => {
      sandbox.writeFile('/tabs.txt', 'a\tb\n');
      sandbox.writeFile('/spaces.txt', '        x\n');
      expect(await stdout('expand tabs.txt')).toBe('a       b');
      expect(await stdout('col tabs.txt')).toBe('a    b');
      expect(await stdout('unexpand spaces.txt')).toBe('\tx');
    });

    it('should keep every line when shuffling', async () => {
      expect((await stdout('shuf fruit.txt')).split('\n').sort()).toEqual(['apple', 'fig', 'pear', 'pear']);
    });

    it('should sort dependencies', async () => {
      sandbox.writeFile('/deps.txt', 'build test\ncompile build\n');
      expect(await stdout('tsort deps.txt')).toBe('compile\nbuild\ntest');
      sandbox.writeFile('/loop.txt', 'a b\nb a\n');
      expect((await sandbox.run('tsort loop.txt')).stderr).toBe('tsort: input contains a loop: a -> b -> a');
    });

    it('should underline underscores', async () => {
      sandbox.writeFile('/u.txt', 'a_b\n');
      expect(await stdout('ul u.txt')).toBe('a\x1b[4m_\x1b[0mb');
    });
  });

  describe('head and tail', () => {
    it('should default to ten lines', async () => {
      sandbox.writeFile('/many.txt', Array.from({ length: 12 }, (_, i) => `line${i + 1}`).join('\n') + '\n');
      expect((await stdout('head many.txt')).split('\n')).toHaveLength(10);
      expect(await stdout('tail -n 2 many.txt')).toBe('line11\nline12');
      expect(await stdout('head -n 1 many.txt')).toBe('line1');
    });

    it('should reject a bad count', async () => {
      expect((await sandbox.run('head -n x fruit.txt')).stderr).toBe('head: usage: head [-n N] <file>');
      expect((await sandbox.run('tail -n')).exitCode).toBe(2);
    });
  });

  describe('wc, cut and paste', () => {
    it('should count lines, words and characters', async () => {
      expect(await stdout('wc table.txt')).toBe('3 6 25 table.txt');
    });

    it('should cut whitespace fields and skip short lines', async () => {
      sandbox.writeFile('/ragged.txt', 'a b\nsolo\nc d\n');
      expect(await stdout('cut -f 2 ragged.txt')).toBe('b\nd');
    });

    it('should cut with a delimiter', async () => {
      sandbox.writeFile('/csv.txt', 'x,1\ny,2\n');
      expect(await stdout('cut -d , -f 2 csv.txt')).toBe('1\n2');
    });

    it('should require -f', async () => {
      expect((await sandbox.run('cut fruit.txt')).stderr).toBe('cut: usage: cut -f N [-d D] <file>');
    });

    it('should paste columns', async () => {
      sandbox.writeFile('/n.txt', '1\n2\n');
      expect(await stdout('paste n.txt fruit.txt')).toBe('1\tpear\n2\tapple\n\tpear\n\tfig');
    });
  });

  describe('tr, sed and awk', () => {
    it('should translate character ranges', async () => {
      expect(await stdout('tr a-z A-Z fruit.txt')).toBe('PEAR\nAPPLE\nPEAR\nFIG');
    });

    it('should replace literal text', async () => {
      expect(await stdout('sed pear plum fruit.txt')).toBe('plum\napple\nplum\nfig');
    });

    it('should apply a substitution command', async () => {
      sandbox.writeFile('/aa.txt', 'aaa\nbab\n');
      expect(await stdout('sed s/a/x/ aa.txt')).toBe('xaa\nbxb');
      expect(await stdout('sed s/a/x/g aa.txt')).toBe('xxx\nbxb');
      expect(await stdout('sed s/^b/B/ aa.txt')).toBe('aaa\nBab');
    });

    it('should reject an invalid regular expression', async () => {
      expect((await sandbox.run('sed s/(/x/ fruit.txt')).stderr).toBe("sed: invalid pattern '('");
    });

    it('should filter with a condition', async () => {
      expect(await stdout('awk NR>1&&$2>10 table.txt')).toBe('kiwi 12');
      expect(await stdout('awk $2>10 table.txt')).toBe('name qty\nkiwi 12');
      expect(await stdout('awk NR==1 table.txt')).toBe('name qty');
      expect(await stdout('awk $1=="apple" table.txt')).toBe('apple 3');
    });
  });

  describe('reshaping', () => {
    it('should fold long lines', async () => {
      sandbox.writeFile('/long.txt', 'abcdefg\n');
      expect(await stdout('fold long.txt 3')).toBe('abc\ndef\ng');
    });

    it('should join on a field', async () => {
      sandbox.writeFile('/names.txt', '1 alice\n2 bob\n');
      sandbox.writeFile('/roles.txt', '2 admin\n');
      expect(await stdout('join names.txt roles.txt 1')).toBe('2 bob admin');
    });

    it('should reflow and paginate', async () => {
      sandbox.writeFile('/words.txt', 'one\ntwo\n\nthree\n');
      expect(await stdout('fmt words.txt')).toBe('one two three');
      expect(await stdout('pr words.txt')).toBe(
        ['File: words.txt', '-'.repeat(72), 'one', 'two', '', 'three', '-'.repeat(72)].join('\n')
      );
    });

    it('should remove columns', async () => {
      sandbox.writeFile('/cols.txt', 'abcdef\nxy\n');
      expect(await stdout('colrm cols.txt 2 3')).toBe('adef\nx');
    });
  });

  describe('comparison', () => {
    beforeEach(() => {
      sandbox.writeFile('/left.txt', 'a\nb\n');
      sandbox.writeFile('/right.txt', 'a\nc\nd\n');
    });

    it('should compare sets of lines', async () => {
      expect(await stdout('comm left.txt right.txt')).toBe('  a\n< b\n> c\n> d');
    });

    it('should diff positionally and exit 1 on differences', async () => {
      expect(await sandbox.run('diff left.txt right.txt')).toEqual({
        stdout: '2c2\n< b\n---\n> c\n3a3\n> d',
        stderr: '',
        exitCode: 1,
      });
      expect(await sandbox.run('diff left.txt left.txt')).toEqual({ stdout: '', stderr: '', exitCode: 0 });
    });

    it('should compare bytes', async () => {
      expect(await sandbox.run('cmp left.txt left.txt')).toEqual({ stdout: '', stderr: '', exitCode: 0 });
      expect(await sandbox.run('cmp left.txt right.txt')).toEqual({
        stdout: 'left.txt right.txt differ: byte 3, line 2',
        stderr: '',
        exitCode: 1,
      });
      sandbox.writeFile('/prefix.txt', 'a\n');
      expect(await sandbox.run('cmp prefix.txt left.txt')).toEqual({
        stdout: '',
        stderr: 'cmp: EOF on prefix.txt after byte 2',
        exitCode: 1,
      });
    });

    it('should patch a file in place', async () => {
      sandbox.writeFile('/fix.diff', '--- left.txt\n+++ left.txt\n@@ -2 +2 @@\n-b\n+B\n');
      expect(await stdout('patch left.txt fix.diff')).toBe('patching file left.txt');
      expect(sandbox.readFile('/left.txt')).toBe('a\nB\n');
    });
  });

  describe('grep', () => {
    it('should print file, line number and text', async () => {
      expect(await sandbox.run('grep pe fruit.txt')).toEqual({
        stdout: 'fruit.txt:1:pear\nfruit.txt:3:pear',
        stderr: '',
        exitCode: 0,
      });
    });

    it('should search several files with flags', async () => {
      expect(await stdout('grep -i APPLE fruit.txt table.txt')).toBe('fruit.txt:2:apple\ntable.txt:2:apple 3');
      expect(await stdout('grep -v p fruit.txt')).toBe('fruit.txt:4:fig');
    });

    it('should exit 1 without matches', async () => {
      expect(await sandbox.run('grep zzz fruit.txt')).toEqual({ stdout: '', stderr: '', exitCode: 1 });
    });

    it('should report a missing file', async () => {
      expect((await sandbox.run('grep a nope.txt')).stderr).toBe('grep: /nope.txt: No such file or directory');
    });
  });
});
