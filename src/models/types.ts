// Core type definitions for the location linker

// Output shape of a resolved token
export type LinkFormat = 'plain' | 'markdown';

// Identifier kinds a revision can resolve to
export type RevisionKind = 'branch' | 'short-commit' | 'commit';
