import type { Decision, DecisionInput } from "../shared/types.js";

export interface DecisionMaker {
    /**
     * Decides the next action from the current screenshot, the goal and the
     * steps taken so far.
     * @throws DecisionError when the model cannot be reached or its reply cannot be parsed
     */
    decide(input: DecisionInput): Promise<Decision>;
}
