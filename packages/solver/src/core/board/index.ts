export { Board } from "./board";
export { attacks } from "./conflicts";
