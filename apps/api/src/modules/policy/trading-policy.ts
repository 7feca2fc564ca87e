const STABLE_ASSETS = new Set([
  "USDT",
  "USDC",
  "FDUSD",
  "USD1",
  "BUSD",
  "TUSD",
  "USDP",
  "USDS",
  "USDE",
  "DAI",
  "PYUSD",
  "EUR",
  "EURC",
  "AEUR"
]);

export function isStableAsset(asset: string | undefined): boolean {
  if (!asset) return false;
  return STABLE_ASSETS.has(asset.trim().toUpperCase());
}

/** Splits `BASE/QUOTE` (optionally `BASE/QUOTE:SETTLE`) into its assets. */
export function splitSymbol(symbol: string): { baseAsset: string; quoteAsset: string } | null {
  const [pair] = symbol.trim().toUpperCase().split(":");
  const [baseAsset, quoteAsset] = pair.split("/");
  if (!baseAsset || !quoteAsset) return null;
  return { baseAsset, quoteAsset };
}

export function getPairPolicyBlockReason(params: {
  symbol: string;
  neverTradeSymbols?: string[];
  excludeStableStablePairs?: boolean;
}): string | null {
  const symbol = params.symbol.trim().toUpperCase();
  const assets = splitSymbol(symbol);
  if (!assets) {
    return `Unrecognized symbol ${symbol}`;
  }

  const neverTradeSymbols = (params.neverTradeSymbols ?? []).map((s) => s.trim().toUpperCase());
  if (neverTradeSymbols.includes(symbol) || neverTradeSymbols.includes(assets.baseAsset)) {
    return "Blocked by never-trade list";
  }

  if ((params.excludeStableStablePairs ?? true) && isStableAsset(assets.baseAsset) && isStableAsset(assets.quoteAsset)) {
    return "Stable/stable pair filtered";
  }

  return null;
}
