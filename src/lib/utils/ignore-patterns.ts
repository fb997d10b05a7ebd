// Always skipped during discovery.
export const DEFAULT_IGNORE_PATTERNS = [".git/", ".hg/", ".svn/", "node_modules/", "__pycache__/"];

// Added when ignore files are honoured.
export const HIDDEN_PATTERNS = [".*", ".*/"];
