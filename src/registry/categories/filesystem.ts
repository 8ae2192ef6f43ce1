/**
 * File system categories: file and directory names, Unix and Windows paths.
 */

import { charClass, isolated, literal, oneOrMore, optional, sequence, union, zeroOrMore } from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';
import { ALNUM } from './common.js';

const SEGMENT_CHARS = '\\w~@%+=,\\-';

const segmentChar = charClass(SEGMENT_CHARS);
const extension = sequence(literal('.'), oneOrMore(charClass(ALNUM)));

/** `notes`, `.bashrc`, `archive.tar.gz` */
const nameCore = sequence(optional(literal('.')), oneOrMore(segmentChar), zeroOrMore(extension));

const segment = union(nameCore, literal('..'), literal('.'));

// ─── Names ───────────────────────────────────────────────────

const NAME_BOUNDARY = { before: `${SEGMENT_CHARS}.`, after: `[${SEGMENT_CHARS}.]` };

/** A name with at least one extension, e.g. `report.pdf`. */
export const fileName = isolated(
  sequence(optional(literal('.')), oneOrMore(segmentChar), oneOrMore(extension)),
  NAME_BOUNDARY
);

/** A single segment without extension, e.g. `src` or `.config`. */
export const dirName = isolated(sequence(optional(literal('.')), oneOrMore(segmentChar)), NAME_BOUNDARY);

// ─── Unix ────────────────────────────────────────────────────

function separated(separator: string, head: Pattern): Pattern {
  return sequence(head, zeroOrMore(sequence(literal(separator), segment)), optional(literal(separator)));
}

/** `/etc/hosts`, `/var/log/` */
export const absoluteUnixPath = isolated(
  separated('/', sequence(literal('/'), segment)),
  { before: `${SEGMENT_CHARS}./:` }
);

/** `./run.sh`, `~/notes`, `src/index.ts`: at least one separator. */
export const relativeUnixPath = isolated(
  sequence(union(segment, literal('~')), oneOrMore(sequence(literal('/'), segment)), optional(literal('/'))),
  { before: `${SEGMENT_CHARS}./:\\\\` }
);

// ─── Windows ─────────────────────────────────────────────────

const driveRoot = sequence(charClass('A-Za-z'), literal(':\\'));

/** `C:\Windows\System32`, `\\fileserver\share\doc.txt` */
export const absoluteWindowsPath = union(
  isolated(
    sequence(driveRoot, optional(separated('\\', segment))),
    { before: '\\w' }
  ),
  isolated(
    sequence(literal('\\\\'), segment, oneOrMore(sequence(literal('\\'), segment)), optional(literal('\\'))),
    { before: '\\w\\\\' }
  )
);

/** `..\bin\tool.exe`, `docs\readme.md`: at least one separator. */
export const relativeWindowsPath = isolated(
  sequence(segment, oneOrMore(sequence(literal('\\'), segment)), optional(literal('\\'))),
  { before: `${SEGMENT_CHARS}.:\\\\/` }
);
