export const SCRIPT_EXTENSION = ".rpy";
export const SCREENPLAY_EXTENSION = ".txt";

export const DEFAULT_INDEX_MAIN_LABEL = "main_index";
export const DEFAULT_GENERATE_MAIN_LABEL = "main";
export const DEFAULT_FILE_NAME_PREFIX = "index_";
export const DEFAULT_LABEL_PAGE_SIZE = 20;

// Fallback label when a name normalises to nothing and no default is given.
export const FALLBACK_LABEL = "label";

export const INDENT = "    ";
export const ELLIPSIS = "...";
