import { errorMessage } from "../errors.js";
import type { ReasoningOracle } from "../oracle/oracle.js";
import { createLogger } from "../utils/logger.js";
import { STRATEGIES } from "./strategies.js";
import { STRATEGY_NAMES, type Strategy } from "./types.js";

const log = createLogger("classifier");

/** Word-boundary patterns per strategy. Each matching pattern adds one point. */
const MARKERS: Record<Strategy, RegExp[]> = {
  aggregation: [
    /\baverage\b/, /\bmean\b/, /\btotal\b/, /\bsum\b/, /\bcount\b/, /\bhow many\b/, /\bnumber of\b/,
    /\bmaximum\b/, /\bminimum\b/, /\bmedian\b/, /\bmax\b/, /\bmin\b/,
  ],
  comparison: [
    /\bcompare[ds]?\b/, /\bhigher\b/, /\blower\b/, /\bgreater\b/, /\bfewer\b/, /\blarger\b/, /\bsmaller\b/,
    /\bbetter\b/, /\bworse\b/, /\bmore than\b/, /\bless than\b/, /\bversus\b/, /\bvs\.?(?=\s|$)/, /\bdifference between\b/,
  ],
  bridge: [/\bwhose\b/, /\bwhere\b/, /\b(?:which|that|who) (?:have|has|had)\b/, /\bfiltered by\b/, /\bamong (?:those|the)\b/],
  sequential: [
    /\btrend\b/, /\bover time\b/, /\bchronological(?:ly)?\b/, /\bsequence\b/, /\bbefore\b/, /\bafter\b/,
    /\bearliest\b/, /\blatest\b/, /\bfrom (?:19|20)\d{2} to (?:19|20)\d{2}\b/, /\b(?:19|20)\d{2}\b/,
  ],
  independent: [/\blist\b/, /\beach\b/, /\brespectively\b/, /\bindividually\b/, /\bseparately\b/, /\btop \d+\b/],
};

export type StrategyScores = Record<Strategy, number>;

export function scoreStrategies(question: string): StrategyScores {
  const text = question.toLowerCase();
  const count = (name: Strategy) => MARKERS[name].filter((re) => re.test(text)).length;
  return {
    aggregation: count("aggregation"),
    comparison: count("comparison"),
    bridge: count("bridge"),
    sequential: count("sequential"),
    independent: count("independent"),
  };
}

/** The heuristic verdict, or undefined when no single strategy has the top score. */
export function classifyHeuristic(question: string): Strategy | undefined {
  const scores = scoreStrategies(question);
  const best = Math.max(...STRATEGY_NAMES.map((s) => scores[s]));
  if (best === 0) return undefined;
  const leaders = STRATEGY_NAMES.filter((s) => scores[s] === best);
  return leaders.length === 1 ? leaders[0] : undefined;
}

/** Map an oracle's free-text label onto the closed strategy set. */
export function parseStrategyLabel(label: string): Strategy | undefined {
  const words = label.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    for (const name of STRATEGY_NAMES) {
      if (STRATEGIES[name].aliases.includes(word)) return name;
    }
  }
  return undefined;
}

const DEFAULT_STRATEGY: Strategy = "independent";

function classificationPrompt(question: string): string {
  return `Classify how the following table question should be decomposed.

Strategies:
- aggregation: compute an aggregate (sum, average, count, max, min) over values
- comparison: compare two or more entities on some metric
- bridge: find an intermediate fact, then use it to look up the answer
- sequential: follow a time series or ordered steps
- independent: answer separate parts that do not depend on each other

Question: ${question}

Reply with exactly one word: aggregation, comparison, bridge, sequential or independent.`;
}

export type StrategyClassifierOptions = {
  /** Consulted when the keyword heuristics are inconclusive. */
  oracle?: ReasoningOracle;
};

export class StrategyClassifier {
  private oracle?: ReasoningOracle;

  constructor(opts: StrategyClassifierOptions = {}) {
    this.oracle = opts.oracle;
  }

  /** Never throws: ambiguity falls back to the oracle, then to "independent". */
  async classify(question: string): Promise<Strategy> {
    const heuristic = classifyHeuristic(question);
    if (heuristic) {
      log.debug("Classified by heuristics", { strategy: heuristic });
      return heuristic;
    }
    if (!this.oracle) {
      log.debug("Heuristics inconclusive and no oracle configured", { fallback: DEFAULT_STRATEGY });
      return DEFAULT_STRATEGY;
    }

    try {
      const label = await this.oracle.infer(classificationPrompt(question));
      const strategy = parseStrategyLabel(label);
      if (strategy) {
        log.debug("Classified by oracle", { strategy });
        return strategy;
      }
      log.warn("Unrecognised strategy label from oracle", { label: label.slice(0, 100), fallback: DEFAULT_STRATEGY });
    } catch (err) {
      log.warn("Oracle classification failed", { error: errorMessage(err), fallback: DEFAULT_STRATEGY });
    }
    return DEFAULT_STRATEGY;
  }
}
