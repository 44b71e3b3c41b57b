/**
 * Environment variable parsing utilities with robust boolean/list handling
 * Addresses truthy coercion pitfalls where "false" string evaluates to true
 */

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  // Invalid value - return default
  return defaultValue;
}

/**
 * Parse a comma-separated list, trimming entries and dropping empty ones.
 * Duplicates keep their first position.
 */
export function parseListEnv(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') {
    return [];
  }

  const out: string[] = [];
  for (const part of value.split(',')) {
    const entry = part.trim();
    if (entry && !out.includes(entry)) {
      out.push(entry);
    }
  }
  return out;
}

/**
 * Name of the per-chain RPC variable: "polygon-zkevm" -> "RPC_POLYGON_ZKEVM"
 */
export function rpcEnvKey(chain: string): string {
  return `RPC_${envSuffix(chain)}`;
}

/**
 * Name of the optional per-chain id variable: "bsc" -> "CHAIN_ID_BSC"
 */
export function chainIdEnvKey(chain: string): string {
  return `CHAIN_ID_${envSuffix(chain)}`;
}

function envSuffix(chain: string): string {
  return chain.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

/**
 * Get string environment variable with optional default
 */
export function getEnvString(
  value: string | undefined,
  defaultValue?: string
): string | undefined {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  return value.trim();
}
