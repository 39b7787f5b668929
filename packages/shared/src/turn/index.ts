export { describeResult, runTurn, type TurnDeps, type TurnInput, type TurnOutcome } from "./turn.js"
