// Full manual page printed by --man

import { HOSTING_ROOT } from '../core/config.js';

export const MANUAL = `NAME
    addlinks - turn repository file references into links

SYNOPSIS
    addlinks [--markdown] [--permanent] [--list] [--verbose] [file...]

DESCRIPTION
    Reads the named files, or standard input when none are given, and looks
    for references of the form

        [revision:]path[:lineno]

    such as "crypto/mem.c:42:" or "master:apps/req.c". Each reference whose
    revision is known to the local repository and whose path exists at that
    revision is replaced with a link of the form

        ${HOSTING_ROOT}/blob/<revision>/<path>#L<lineno>

    Paths are taken relative to the current directory. References without a
    revision use the current branch. A revision that also exists as a branch
    on the hosting remote is linked by name; any other revision is linked by
    its abbreviated commit id.

    References that do not resolve are left as they are. A colon right after
    a reference is written as a space. A directory followed by "/" is linked
    too.

    The command must be run inside a clone of ${HOSTING_ROOT}.

OPTIONS
    -m, --markdown
        Write "[reference](link)" instead of the bare link.

    -p, --permanent
        Always link to the full commit id, even for branches the hosting
        remote has.

    -l, --list
        Write only the links, one per line, and drop all other text.

    -v, --verbose
        Log git failures and lookups on standard error.

    -h, --help
        Print a brief help message.

    --man
        Print this manual.

EXIT STATUS
    0   all input processed
    1   an input file could not be read, or the command line was not understood
    2   invalid option values
    3   not inside a clone of the hosting repository
`;
