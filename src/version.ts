export const SERVER_NAME = 'llama-completion-mcp';
export const VERSION = '1.0.0';
