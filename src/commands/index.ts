export {
	type CliArgs,
	type CliCommand,
	type ParseResult,
	parseCliArgs,
	USAGE,
} from './args.js';
export {
	type CliIO,
	DEFAULT_CATALOGUE_PATH,
	EXIT_FAILURE,
	EXIT_NOT_FOUND,
	EXIT_OK,
	formatRecommendationText,
	resolveCliConfig,
	runCli,
} from './run.js';
