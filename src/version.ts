/** Package version (matches package.json) */
export const VERSION = '0.1.0';
