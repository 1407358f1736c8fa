export {
	type RateConverterConfig,
	RateConverter,
	parseAnnualRate,
	formatRate,
} from "./rate-converter.js";
export { sharesDue } from "./accrual.js";
