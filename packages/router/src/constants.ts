export const DEFAULT_SEPARATOR = '/';

export const CATCH_ALL_TOKEN = '**';
export const WILDCARD_TOKEN = '*';
export const PARAMETER_SIGIL = ':';
export const CAPTURE_OPEN = '{';
export const CAPTURE_CLOSE = '}';

export const NO_INDEX = -1;

export const LOGGER_CONTEXT = 'PathTrie';
