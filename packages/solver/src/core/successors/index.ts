export { nextCandidateRow, SuccessorIterator } from "./successor-iterator";
