export {
	type MatchKind,
	type ResolvedTitle,
	type ResolveOutcome,
	resolveTitle,
	type UnresolvedTitle,
} from './resolver.js';
export {
	longestCommonSubsequence,
	similarityRatio,
} from './text-similarity.js';
