export type RpcErrorKind = 'rate_limit' | 'timeout' | 'network' | 'no_fee_data' | 'unknown';

/**
 * Classify an RPC failure for logs and metrics labels
 */
export function classifyRpcError(err: unknown): RpcErrorKind {
  const errString = err instanceof Error ? `${err.name} ${err.message}` : String(err);

  if (
    errString.includes('429') ||
    errString.includes('rate limit') ||
    errString.includes('exceeded its capacity')
  ) {
    return 'rate_limit';
  }
  if (errString.includes('timeout') || errString.includes('timed out') || errString.includes('TimeoutError')) {
    return 'timeout';
  }
  if (
    errString.includes('ETIMEDOUT') ||
    errString.includes('ECONNREFUSED') ||
    errString.includes('ENOTFOUND') ||
    errString.includes('network')
  ) {
    return 'network';
  }
  if (errString.includes('no base fee or gas price')) {
    return 'no_fee_data';
  }
  return 'unknown';
}
