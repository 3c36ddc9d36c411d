import { z } from 'zod';

// --- market / execution entities ---

export const Signal = z.enum(['LONG', 'FLAT', 'SHORT']);
export type Signal = z.infer<typeof Signal>;

export const Venue = z.enum(['sim', 'paper', 'real']);
export type Venue = z.infer<typeof Venue>;

export const OrderSide = z.enum(['buy', 'sell']);
export type OrderSide = z.infer<typeof OrderSide>;

export const OrderType = z.enum(['market', 'limit']);
export type OrderType = z.infer<typeof OrderType>;

export const TimeInForce = z.enum(['day', 'gtc']);
export type TimeInForce = z.infer<typeof TimeInForce>;

export const OrderIntent = z.object({
  id: z.string(),
  agentId: z.string(),
  symbol: z.string().min(1),
  side: OrderSide,
  qty: z.number().positive(),
  // last quote the router sized against
  refPrice: z.number().positive(),
  type: OrderType,
  timeInForce: TimeInForce,
  limitPrice: z.number().positive().optional(),
  extendedHours: z.boolean(),
  createdAt: z.string(),
});
export type OrderIntent = Readonly<z.infer<typeof OrderIntent>>;

export const Position = z.object({
  symbol: z.string(),
  qty: z.number(),
  avgPrice: z.number().min(0),
});
export type Position = z.infer<typeof Position>;

export const EquitySnapshot = z.object({
  cash: z.number(),
  positionsValue: z.number(),
  equity: z.number(),
  // equity at the start of the current trading day
  lastEquity: z.number(),
  ts: z.string(),
});
export type EquitySnapshot = z.infer<typeof EquitySnapshot>;

export const Fill = z.object({
  orderId: z.string(),
  intentId: z.string(),
  agentId: z.string(),
  symbol: z.string(),
  side: OrderSide,
  qty: z.number().positive(),
  price: z.number().positive(),
  ts: z.string(),
  realizedPnl: z.number(),
  broker: z.string(),
});
export type Fill = Readonly<z.infer<typeof Fill>>;

export const RejectionKind = z.enum(['guardrail', 'broker', 'unknown_outcome']);
export type RejectionKind = z.infer<typeof RejectionKind>;

export const Rejection = z.object({
  intentId: z.string(),
  agentId: z.string(),
  symbol: z.string(),
  kind: RejectionKind,
  reason: z.string(),
  message: z.string(),
  ts: z.string(),
});
export type Rejection = Readonly<z.infer<typeof Rejection>>;

export const CycleBatch = z.object({
  agentId: z.string(),
  fills: z.array(Fill),
  rejections: z.array(Rejection),
  equity: EquitySnapshot,
});
export type CycleBatch = z.infer<typeof CycleBatch>;

// --- agents & league ---

export const Lineage = z.object({
  parentId: z.string().optional(),
  version: z.number().int().optional(),
  mutation: z.string().optional(),
});
export type Lineage = z.infer<typeof Lineage>;

export const AgentRecord = z.object({
  agentId: z.string(),
  builderName: z.string().nullable(),
  builderModel: z.string().nullable(),
  lineage: Lineage.nullable(),
  configHash: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type AgentRecord = z.infer<typeof AgentRecord>;

export const KpiSet = z.object({
  netPnl: z.number(),
  winRate: z.number().min(0).max(1),
  maxDrawdown: z.number().min(0),
  tradeCount: z.number().min(0),
  score: z.number(),
  /** Mean over standard deviation of per-period returns; not annualized. */
  sharpe: z.number().default(0),
  /** Gross realized gains over gross realized losses; null when there are gains and no losses. */
  profitFactor: z.number().min(0).nullable().default(null),
});
export type KpiSet = z.infer<typeof KpiSet>;

export const AllocationAction = z.enum(['promote', 'retire', 'hold']);
export type AllocationAction = z.infer<typeof AllocationAction>;

export const RecommendationStatus = z.enum(['ok', 'insufficient_data', 'error']);
export type RecommendationStatus = z.infer<typeof RecommendationStatus>;

export const AllocationRecommendation = z.object({
  agentId: z.string(),
  action: AllocationAction,
  weight: z.number().min(0),
  rationale: z.string(),
  status: RecommendationStatus,
  kpis: KpiSet.nullable(),
  members: z.array(z.string()).optional(),
});
export type AllocationRecommendation = z.infer<typeof AllocationRecommendation>;

export const GroupBy = z.enum(['agent', 'builder']);
export type GroupBy = z.infer<typeof GroupBy>;

export const LeagueReport = z.object({
  runId: z.string(),
  generatedAt: z.string(),
  tradingDay: z.string(),
  lookbackDays: z.number().int().positive(),
  groupBy: GroupBy,
  recommendations: z.array(AllocationRecommendation),
});
export type LeagueReport = z.infer<typeof LeagueReport>;

// --- configuration surface ---

const HHMM = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export const SizingConfig = z.object({
  sizePct: z.number().gt(0).max(1).default(0.1),
  lotSize: z.number().positive().default(1),
});
export type SizingConfig = z.infer<typeof SizingConfig>;

export const GuardrailConfig = z.object({
  maxPositionPct: z.number().gt(0).max(1).default(0.5),
  maxOrderNotional: z.number().positive().optional(),
  maxDailyLoss: z.number().positive().optional(),
  allowAfterHours: z.boolean().default(false),
  afterHoursLimitBps: z.number().min(0).max(500).default(10),
});
export type GuardrailConfig = z.infer<typeof GuardrailConfig>;

export const BrokerConfig = z.object({
  venue: Venue.default('sim'),
  cash: z.number().positive().default(10_000),
  slippageBps: z.number().min(0).default(0),
  commission: z.number().min(0).default(0),
  baseUrl: z.string().url().optional(),
  dataUrl: z.string().url().optional(),
  submitTimeoutMs: z.number().int().positive().default(15_000),
  retryBackoffMs: z.number().int().min(0).default(1_000),
  historyBars: z.number().int().min(2).default(200),
  prices: z.record(z.array(z.number().positive()).min(1)).optional(),
});
export type BrokerConfig = z.infer<typeof BrokerConfig>;

export const ScheduleConfig = z.object({
  timezone: z.string().refine(isTimeZone, 'unknown time zone').default('America/New_York'),
  open: HHMM.default('09:30'),
  close: HHMM.default('16:00'),
  cycleMinutes: z.number().positive().default(5),
  maxSteps: z.number().int().positive().default(60),
  flattenAtEnd: z.boolean().default(false),
}).refine((s) => s.open < s.close, { message: 'open must be before close', path: ['close'] });
export type ScheduleConfig = z.infer<typeof ScheduleConfig>;

export const LeaguePolicy = z.object({
  lookbackDays: z.number().int().positive().default(30),
  minTrades: z.number().int().min(0).default(5),
  promoteFraction: z.number().min(0).max(1).default(0.25),
  retireFraction: z.number().min(0).max(1).default(0.25),
  retireFloor: z.number().default(0),
  drawdownFloor: z.number().positive().default(1),
  groupBy: GroupBy.default('agent'),
});
export type LeaguePolicy = z.infer<typeof LeaguePolicy>;

export const StorageConfig = z.object({
  backend: z.enum(['memory', 'postgres']).default('memory'),
  url: z.string().optional(),
  artifactsDir: z.string().optional(),
}).refine((s) => s.backend !== 'postgres' || !!s.url, { message: 'postgres backend needs a url', path: ['url'] });
export type StorageConfig = z.infer<typeof StorageConfig>;

export const StrategyConfig = z.object({
  name: z.string().default('rsi_mean_rev'),
  params: z.record(z.number()).default({}),
});
export type StrategyConfig = z.infer<typeof StrategyConfig>;

export const AgentMeta = z.object({
  id: z.string().min(1),
  builder: z.object({ name: z.string().min(1), model: z.string().optional() }).optional(),
  lineage: Lineage.optional(),
});
export type AgentMeta = z.infer<typeof AgentMeta>;

export const AgentConfig = z.object({
  agent: AgentMeta,
  symbols: z.array(z.string().min(1)).min(1, 'symbol universe must not be empty'),
  strategy: StrategyConfig.default({}),
  sizing: SizingConfig.default({}),
  guardrails: GuardrailConfig.default({}),
  broker: BrokerConfig.default({}),
  schedule: ScheduleConfig.default({}),
  league: LeaguePolicy.default({}),
  storage: StorageConfig.default({}),
});
export type AgentConfig = z.infer<typeof AgentConfig>;
export type AgentConfigInput = z.input<typeof AgentConfig>;
