import { z } from "zod";
import { FunctionCapability } from "../capabilities/function-capability.js";
import type { CapabilityRequest } from "../capabilities/capability.js";
import { CallError } from "../errors.js";
import { stableHash } from "../utils/stable-json.js";
import {
  DEFAULT_TOP_N,
  MarketStockSchema,
  PickSchema,
  RankingSchema,
  RiskAssessmentSchema,
  SentimentEntrySchema,
  UniverseEntrySchema,
  buildTheses,
  inputField,
  rankStocks,
  round2,
  selectTop,
  sentimentLabel,
  type RiskLevel,
} from "./stock-analysis.js";

export type SyntheticCapabilityOptions = {
  /** Stage kinds whose every call fails, forcing the fallback path. */
  failKinds?: readonly string[];
};

const RISK_LEVELS: readonly RiskLevel[] = ["low", "medium", "high"];

/** Five 16-bit numbers derived from a ticker. */
function digits(ticker: string): number[] {
  const hash = stableHash(ticker);
  return [0, 1, 2, 3, 4].map((i) => parseInt(hash.slice(i * 4, i * 4 + 4), 16));
}

function respond(request: CapabilityRequest): unknown {
  const { input } = request;
  switch (request.kind) {
    case "market-data":
      return {
        stocks: inputField(input, "universe", z.array(UniverseEntrySchema), []).map((entry) => {
          const [a, b, c] = digits(entry.ticker);
          return {
            ...entry,
            metrics: {
              peRatio: round2(8 + (a % 3200) / 100),
              revenueGrowth: round2((b % 4000) / 100 - 10),
              score: round2(30 + (c % 7000) / 100),
            },
          };
        }),
      };
    case "sentiment":
      return {
        sentiments: inputField(input, "stocks", z.array(MarketStockSchema), []).map((stock) => {
          const score = round2(((digits(stock.ticker)[3] % 201) - 100) / 100);
          const label = sentimentLabel(score);
          return { ticker: stock.ticker, score, label, summary: `Coverage of ${stock.companyName} reads ${label}.` };
        }),
      };
    case "integrated-analysis":
      return {
        rankings: rankStocks(
          inputField(input, "stocks", z.array(MarketStockSchema), []),
          inputField(input, "sentiments", z.array(SentimentEntrySchema), []),
        ),
      };
    case "selection":
      return {
        picks: selectTop(
          inputField(input, "rankings", z.array(RankingSchema), []),
          inputField(input, "topN", z.number().int().positive(), DEFAULT_TOP_N),
        ),
      };
    case "risk-review":
      return {
        assessments: inputField(input, "picks", z.array(PickSchema), []).map((pick) => {
          const level = RISK_LEVELS[digits(pick.ticker)[4] % RISK_LEVELS.length] ?? "medium";
          return { ticker: pick.ticker, level, notes: `${pick.companyName} screens as ${level} risk.` };
        }),
      };
    case "thesis":
      return {
        investments: buildTheses(
          inputField(input, "picks", z.array(PickSchema), []),
          inputField(input, "assessments", z.array(RiskAssessmentSchema), []),
        ),
      };
    default:
      throw new CallError("capability", `Synthetic capability does not serve stage kind "${request.kind}"`);
  }
}

/**
 * Fixed, deterministic stand-in for every stock-analysis stage. Responses are
 * markdown-fenced JSON, the way a language model usually answers.
 */
export function createSyntheticCapability(opts: SyntheticCapabilityOptions = {}): FunctionCapability {
  const failing = new Set(opts.failKinds ?? []);
  return new FunctionCapability({
    name: "synthetic",
    kinds: ["*"],
    description: "Deterministic stub for the built-in stock-analysis pipeline",
    fn: async (request) => {
      if (failing.has(request.kind)) {
        throw new CallError("capability", `Synthetic failure for stage kind "${request.kind}"`);
      }
      return "```json\n" + JSON.stringify(respond(request)) + "\n```";
    },
  });
}
