import path from 'path';

/**
 * Directory holding targets.json, text-scales.json and user-agents.json
 */
export function resolveConfigDir(): string {
  return process.env.CONFIG_DIR || path.join(process.cwd(), 'configs');
}
