import {
  ls, cd, pwd, mkdir, rmdir, rm, cp, mv, touch, cat, echo, ln, link, unlink, readlink, realpath,
  dirname, basename, pathchk, truncate, split, csplit, mktemp, stat, file, mime, chmod, chown, du, df, find
} from './filesystem';
import {
  sort, uniq, head, tail, wc, cut, paste, tr, sed, awk, nl, fold, expand, unexpand, join, comm, diff,
  patch, cmp, rev, tac, tsort, fmt, pr, ul, col, colrm, column, shuf, grep
} from './text';
import { sum, cksum, md5sum, sha1sum, sha256sum, od, hexdump, strings } from './checksum';
import { factor, seq, expr, bc, test, printf, numfmt } from './math';
import {
  about, clear, date, cal, uname, uptime, ps, top, kill, whoami, sleep, time, watch, yes, history
} from './system';
import { env, exportCmd, unset } from './environment';
import { alias, unalias } from './alias';
import { which, whereis } from './which';
import { help } from './help';
import { man } from './man';
import type { BuiltinCommand } from '../types';

/**
 * Every builtin, keyed by the name it is invoked with. `src/data/commands.json`
 * must document exactly these names.
 */
export const BUILTIN_COMMANDS: Readonly<Record<string, BuiltinCommand>> = {
  // Navigation & files
  ls,
  cd,
  pwd,
  mkdir,
  rmdir,
  rm,
  cp,
  mv,
  touch,
  cat,
  echo,
  ln,
  link,
  unlink,
  readlink,
  realpath,
  dirname,
  basename,
  pathchk,
  truncate,
  split,
  csplit,
  mktemp,
  stat,
  file,
  mime,
  chmod,
  chown,
  du,
  df,
  find,

  // Text
  sort,
  uniq,
  head,
  tail,
  wc,
  cut,
  paste,
  tr,
  sed,
  awk,
  nl,
  fold,
  expand,
  unexpand,
  join,
  comm,
  diff,
  patch,
  cmp,
  rev,
  tac,
  tsort,
  fmt,
  pr,
  ul,
  col,
  colrm,
  column,
  shuf,
  grep,

  // Checksums and dumps
  sum,
  cksum,
  md5sum,
  sha1sum,
  sha256sum,
  od,
  hexdump,
  strings,

  // Math
  factor,
  seq,
  expr,
  bc,
  test,
  printf,
  numfmt,

  // System
  about,
  clear,
  date,
  cal,
  uname,
  uptime,
  ps,
  top,
  kill,
  whoami,
  sleep,
  time,
  watch,
  yes,
  history,

  // Shell
  alias,
  unalias,
  export: exportCmd,
  env,
  unset,
  which,
  whereis,
  help,
  man,
};
