export { solutionsByBruteForce } from "./brute-force";
export {
  bestSuccessor,
  type ClimbStep,
  type HillClimbingOptions,
  type ScoredBoard,
  solveByHillClimbing,
} from "./hill-climbing";
export {
  type RestartOptions,
  type RestartOutcome,
  solveWithRestarts,
} from "./restarts";
