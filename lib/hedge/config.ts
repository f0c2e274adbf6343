export interface CostConfig {
  commissionRate: number;   // per side, e.g. 0.0002 = 2bp
  financingRate: number;    // annual
  slippageRate: number;     // per side
  marginRate: number;       // fraction of position posted as margin
}

export interface HedgeConfig {
  hedgeDays: number;
  confidence: number;       // e.g. 0.95
  positionValue: number;
  costs: CostConfig;
}

export const DEFAULT_HEDGE_CONFIG: HedgeConfig = {
  hedgeDays: 7,
  confidence: 0.95,
  positionValue: 1_000_000,
  costs: {
    commissionRate: 0.0002,
    financingRate: 0.05,
    slippageRate: 0.0001,
    marginRate: 0.1,
  },
};

type Env = Record<string, string | undefined>;

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  valid: (n: number) => boolean = n => n >= 0
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || !valid(n)) {
    console.warn(`Ignoring invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return n;
}

/** Hedge parameters from HEDGE_* environment variables, defaults elsewhere. */
export function loadHedgeConfig(env: Env = process.env): HedgeConfig {
  const d = DEFAULT_HEDGE_CONFIG;
  return {
    hedgeDays: readNumber(env, "HEDGE_DAYS", d.hedgeDays, n => Number.isInteger(n) && n > 0),
    confidence: readNumber(env, "HEDGE_CONFIDENCE", d.confidence, n => n > 0 && n < 1),
    positionValue: readNumber(env, "HEDGE_POSITION_VALUE", d.positionValue, n => n > 0),
    costs: {
      commissionRate: readNumber(env, "HEDGE_COMMISSION_RATE", d.costs.commissionRate),
      financingRate: readNumber(env, "HEDGE_FINANCING_RATE", d.costs.financingRate),
      slippageRate: readNumber(env, "HEDGE_SLIPPAGE_RATE", d.costs.slippageRate),
      marginRate: readNumber(env, "HEDGE_MARGIN_RATE", d.costs.marginRate),
    },
  };
}
