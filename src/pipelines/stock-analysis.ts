import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { StageCatalog } from "../catalog.js";
import type { FallbackContext } from "../fallback/synthesizer.js";
import type { JsonObject } from "../utils/stable-json.js";
import { definePolicy } from "../validation/policy.js";

export const STOCK_ANALYSIS_PIPELINE_PATH = fileURLToPath(new URL("../../pipelines/stock-analysis.json", import.meta.url));
const UNIVERSE_PATH = fileURLToPath(new URL("../../data/universe.json", import.meta.url));

export const DEFAULT_TOP_N = 3;

// --- Output contracts ---

const TickerSchema = z.string().regex(/^[A-Z][A-Z0-9.-]{0,9}$/, "must be an exchange ticker symbol");

export const UniverseEntrySchema = z.object({
  ticker: TickerSchema,
  companyName: z.string().min(1),
  sector: z.string().min(1),
});

export const MarketStockSchema = UniverseEntrySchema.extend({
  metrics: z.object({
    peRatio: z.number().nullable(),
    /** Year-over-year, in percent. */
    revenueGrowth: z.number().nullable(),
    /** Screening score, 0-100. */
    score: z.number().min(0).max(100),
  }),
});

export const MarketDataSchema = z.object({ stocks: z.array(MarketStockSchema).min(1) });

export const SentimentEntrySchema = z.object({
  ticker: TickerSchema,
  score: z.number().min(-1).max(1),
  label: z.enum(["positive", "neutral", "negative"]),
  summary: z.string(),
});

export const SentimentSchema = z.object({ sentiments: z.array(SentimentEntrySchema) });

export const RankingSchema = z.object({
  ticker: TickerSchema,
  companyName: z.string().min(1),
  score: z.number(),
  rationale: z.string(),
});

export const IntegratedAnalysisSchema = z.object({ rankings: z.array(RankingSchema).min(1) });

export const PickSchema = z.object({
  ticker: TickerSchema,
  companyName: z.string().min(1),
  justification: z.string(),
});

export const SelectionSchema = z.object({ picks: z.array(PickSchema).min(1) });

export const RiskLevelSchema = z.enum(["low", "medium", "high"]);

export const RiskAssessmentSchema = z.object({
  ticker: TickerSchema,
  level: RiskLevelSchema,
  notes: z.string(),
});

export const RiskReviewSchema = z.object({ assessments: z.array(RiskAssessmentSchema) });

export const ThesisSchema = z.object({
  investments: z
    .array(
      z.object({
        company_name: z.string().min(1),
        ticker: TickerSchema,
        thesis: z.string(),
      }),
    )
    .min(1),
});

export type UniverseEntry = z.infer<typeof UniverseEntrySchema>;
export type MarketStock = z.infer<typeof MarketStockSchema>;
export type SentimentEntry = z.infer<typeof SentimentEntrySchema>;
export type Ranking = z.infer<typeof RankingSchema>;
export type StockPick = z.infer<typeof PickSchema>;
export type RiskLevel = z.infer<typeof RiskLevelSchema>;
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;
export type Investment = z.infer<typeof ThesisSchema>["investments"][number];

// --- Shared stage logic (used by the fallbacks and the synthetic capability) ---

/** Read one field of a projected input, or `otherwise` when it is absent or malformed. */
export function inputField<T>(input: Readonly<JsonObject>, key: string, schema: z.ZodType<T>, otherwise: T): T {
  const parsed = schema.safeParse(input[key]);
  return parsed.success ? parsed.data : otherwise;
}

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function sentimentLabel(score: number): SentimentEntry["label"] {
  if (score > 0.2) return "positive";
  if (score < -0.2) return "negative";
  return "neutral";
}

/** Highest score first; equal scores by ticker. */
export function compareRankings(a: Pick<Ranking, "score" | "ticker">, b: Pick<Ranking, "score" | "ticker">): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0;
}

/** Composite score = screening score + 10 × sentiment (missing sentiment counts as 0). */
export function rankStocks(stocks: readonly MarketStock[], sentiments: readonly SentimentEntry[]): Ranking[] {
  const byTicker = new Map(sentiments.map((s) => [s.ticker, s.score]));
  return stocks
    .map((stock) => {
      const sentiment = byTicker.get(stock.ticker) ?? 0;
      const score = round2(stock.metrics.score + 10 * sentiment);
      return {
        ticker: stock.ticker,
        companyName: stock.companyName,
        score,
        rationale: `Composite score ${score} from a screening score of ${stock.metrics.score} and sentiment of ${sentiment}.`,
      };
    })
    .sort(compareRankings);
}

export function selectTop(rankings: readonly Ranking[], topN: number): StockPick[] {
  const sorted = [...rankings].sort(compareRankings);
  return sorted.slice(0, topN).map((r, i) => ({
    ticker: r.ticker,
    companyName: r.companyName,
    justification: `Ranked #${i + 1} of ${sorted.length} by composite score (${r.score}).`,
  }));
}

export function buildTheses(picks: readonly StockPick[], assessments: readonly RiskAssessment[]): Investment[] {
  const levels = new Map(assessments.map((a) => [a.ticker, a.level]));
  return picks.map((pick) => ({
    company_name: pick.companyName,
    ticker: pick.ticker,
    thesis: `${pick.companyName} (${pick.ticker}) was selected from the screened universe. ${pick.justification} Assessed risk: ${levels.get(pick.ticker) ?? "medium"}.`,
  }));
}

// --- Fallbacks ---

const universeOf = (ctx: FallbackContext) => inputField(ctx.input, "universe", z.array(UniverseEntrySchema), []);
const stocksOf = (ctx: FallbackContext) => inputField(ctx.input, "stocks", z.array(MarketStockSchema), []);
const picksOf = (ctx: FallbackContext) => inputField(ctx.input, "picks", z.array(PickSchema), []);

/** Universe with unknown metrics and a neutral screening score. */
function marketDataFallback(ctx: FallbackContext) {
  return {
    stocks: universeOf(ctx).map((entry) => ({
      ...entry,
      metrics: { peRatio: null, revenueGrowth: null, score: 50 },
    })),
  };
}

function sentimentFallback(ctx: FallbackContext) {
  return {
    sentiments: stocksOf(ctx).map((stock) => ({
      ticker: stock.ticker,
      score: 0,
      label: "neutral" as const,
      summary: `No sentiment signal was available for ${stock.companyName}; treated as neutral.`,
    })),
  };
}

function integratedAnalysisFallback(ctx: FallbackContext) {
  const sentiments = inputField(ctx.input, "sentiments", z.array(SentimentEntrySchema), []);
  return { rankings: rankStocks(stocksOf(ctx), sentiments) };
}

function selectionFallback(ctx: FallbackContext) {
  const rankings = inputField(ctx.input, "rankings", z.array(RankingSchema), []);
  const topN = inputField(ctx.input, "topN", z.number().int().positive(), DEFAULT_TOP_N);
  return { picks: selectTop(rankings, topN) };
}

function riskReviewFallback(ctx: FallbackContext) {
  return {
    assessments: picksOf(ctx).map((pick) => ({
      ticker: pick.ticker,
      level: "medium" as const,
      notes: `No independent risk review was available for ${pick.companyName}; a moderate risk level was assigned.`,
    })),
  };
}

function thesisFallback(ctx: FallbackContext) {
  const assessments = inputField(ctx.input, "assessments", z.array(RiskAssessmentSchema), []);
  return { investments: buildTheses(picksOf(ctx), assessments) };
}

/** Stage kinds of the stock-analysis workflow. */
export function createStockAnalysisCatalog(): StageCatalog {
  return new StageCatalog([
    {
      kind: "market-data",
      description: "Fundamental metrics and a screening score per stock",
      policy: definePolicy({
        name: "market-data",
        schema: MarketDataSchema,
        requiredFields: ["stocks", "stocks.*.ticker", "stocks.*.companyName"],
      }),
      fallback: marketDataFallback,
    },
    {
      kind: "sentiment",
      description: "Sentiment score per stock",
      policy: definePolicy({
        name: "sentiment",
        schema: SentimentSchema,
        requiredFields: ["sentiments", "sentiments.*.summary"],
      }),
      fallback: sentimentFallback,
    },
    {
      kind: "integrated-analysis",
      description: "Ranking that combines fundamentals and sentiment",
      policy: definePolicy({
        name: "integrated-analysis",
        schema: IntegratedAnalysisSchema,
        requiredFields: ["rankings", "rankings.*.rationale"],
      }),
      fallback: integratedAnalysisFallback,
    },
    {
      kind: "selection",
      description: "Top candidates with justification",
      policy: definePolicy({
        name: "selection",
        schema: SelectionSchema,
        requiredFields: ["picks", "picks.*.justification"],
      }),
      fallback: selectionFallback,
    },
    {
      kind: "risk-review",
      description: "Risk level per selected stock",
      policy: definePolicy({
        name: "risk-review",
        schema: RiskReviewSchema,
        requiredFields: ["assessments", "assessments.*.notes"],
      }),
      fallback: riskReviewFallback,
    },
    {
      kind: "thesis",
      description: "Investment thesis per pick",
      policy: definePolicy({
        name: "thesis",
        schema: ThesisSchema,
        requiredFields: ["investments", "investments.*.company_name", "investments.*.ticker", "investments.*.thesis"],
      }),
      fallback: thesisFallback,
    },
  ]);
}

export function loadUniverse(path = UNIVERSE_PATH): UniverseEntry[] {
  return z.array(UniverseEntrySchema).parse(JSON.parse(readFileSync(path, "utf8")));
}

/** The run input used when the caller supplies none. */
export function defaultRunInput(date = new Date()): JsonObject {
  return {
    market: "US",
    universe: loadUniverse(),
    topN: DEFAULT_TOP_N,
    analysisDate: date.toISOString().slice(0, 10),
  };
}
