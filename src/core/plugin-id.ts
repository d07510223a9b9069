export const PLUGIN_NAME = 'openobserve-mcp';
export const PLUGIN_VERSION = '0.1.0';
