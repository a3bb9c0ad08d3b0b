export * from './src/builder/trie-builder';
export * from './src/builder/types';
export * from './src/constants';
export * from './src/enums';
export * from './src/errors/errors';
export * from './src/options/trie-options';
export * from './src/params/parameters';
export * from './src/params/param-parsers';
export * from './src/pattern/pattern-formatter';
export * from './src/pattern/pattern-parser';
export * from './src/segmenter/split-sequence';
export * from './src/trie/path-trie';
export * from './src/types';
