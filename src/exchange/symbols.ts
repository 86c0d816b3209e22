/**
 * Map legacy v1 spot symbols (BTCUSDT_SPBL) to the v2 form (BTCUSDT)
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase().replace(/_SPBL$/, '');
}
