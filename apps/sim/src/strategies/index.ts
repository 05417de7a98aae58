import type { Rng } from "../rng";
import type { Strategy, StrategyName } from "../types";
import { makeFirstOpenStrategy } from "./firstOpenStrategy";
import { makeRandomStrategy } from "./randomStrategy";
import { makeWeightedStrategy } from "./weightedStrategy";

export { makeFirstOpenStrategy } from "./firstOpenStrategy";
export { makeRandomStrategy } from "./randomStrategy";
export { makeWeightedStrategy, type WeightedStrategy } from "./weightedStrategy";

export const STRATEGY_NAMES = ["first-open", "random", "weighted"] as const;

export function createStrategy(name: StrategyName, rng: Rng): Strategy {
	switch (name) {
		case "first-open":
			return makeFirstOpenStrategy();
		case "random":
			return makeRandomStrategy(rng);
		case "weighted":
			return makeWeightedStrategy(rng);
	}
}
