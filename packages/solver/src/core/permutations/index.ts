export { heapPermutations, type PermutationSource } from "./heap-permutations";
