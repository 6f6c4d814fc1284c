export { getAlertctlDir, ensureAlertctlDir, getConfigPath, loadConfig, saveConfig } from './loader.js';
