import type {
  DcfInputs,
  DcfScenarioResult,
  FinancialSnapshot,
  GrowthScenario,
  Maybe,
  ProjectedYear,
  Scenario,
  ScenarioMap,
  ValuationRange
} from '../types';
import { clamp, isPresent } from './missing';

export const SCENARIOS: readonly Scenario[] = ['low', 'base', 'high'];

export const DEFAULT_SCENARIOS: ScenarioMap = Object.freeze({
  low: Object.freeze({ growth: 0.03, terminalGrowth: 0.01 }),
  base: Object.freeze({ growth: 0.06, terminalGrowth: 0.02 }),
  high: Object.freeze({ growth: 0.09, terminalGrowth: 0.03 })
});

// Each run gets its own copy of the scenario parameters.
const copyScenarios = (scenarios: ScenarioMap): ScenarioMap => ({
  low: { ...scenarios.low },
  base: { ...scenarios.base },
  high: { ...scenarios.high }
});

export const DCF_DEFAULTS = {
  taxRate: 0.22,
  wacc: 0.09,
  years: 5,
  dAndAPct: 0.05,
  capexPct: 0.06,
  ebitMargin: 0.15,
  nwcPct: 0.10
} as const;

const MAX_EBIT_MARGIN = 0.5;
// Negative operating NWC is legal (retailers collect before they pay).
const NWC_PCT_BOUNDS = { lower: -0.3, upper: 0.5 } as const;

const shareOfRevenue = (value: Maybe, revenue: Maybe): Maybe =>
  isPresent(value) && isPresent(revenue) && revenue > 0 ? value / revenue : null;

export const inferDcfInputs = (snapshot: FinancialSnapshot): DcfInputs => {
  const revenue = snapshot.revenueTtm;

  const dAndAShare = shareOfRevenue(snapshot.dAndATtm, revenue);
  const dAndAPct = isPresent(dAndAShare) ? Math.max(0, dAndAShare) : DCF_DEFAULTS.dAndAPct;

  const capexShare = shareOfRevenue(snapshot.capexTtm, revenue);
  const capexPct = isPresent(capexShare) ? Math.max(0, capexShare) : DCF_DEFAULTS.capexPct;

  // Prefer reported operating income; otherwise EBITDA margin less D&A.
  const operatingShare = shareOfRevenue(snapshot.operatingIncomeTtm, revenue);
  const ebitdaShare = shareOfRevenue(snapshot.ebitdaTtm, revenue);
  let ebitMargin: number = DCF_DEFAULTS.ebitMargin;
  if (isPresent(operatingShare)) {
    ebitMargin = clamp(operatingShare, 0, MAX_EBIT_MARGIN);
  } else if (isPresent(ebitdaShare)) {
    ebitMargin = clamp(ebitdaShare - dAndAPct, 0, MAX_EBIT_MARGIN);
  }

  const nwcShare = shareOfRevenue(snapshot.operatingNwc, revenue);
  const nwcPct = isPresent(nwcShare)
    ? clamp(nwcShare, NWC_PCT_BOUNDS.lower, NWC_PCT_BOUNDS.upper)
    : DCF_DEFAULTS.nwcPct;

  return {
    revenueTtm: isPresent(revenue) ? revenue : null,
    ebitMargin,
    taxRate: DCF_DEFAULTS.taxRate,
    capexPct,
    dAndAPct,
    nwcPct,
    wacc: DCF_DEFAULTS.wacc,
    years: DCF_DEFAULTS.years,
    scenarios: copyScenarios(DEFAULT_SCENARIOS)
  };
};

/**
 * FCFF projection for one growth / terminal-growth pair.
 *
 * CAPEX% tapers linearly from its starting level to D&A% by the final
 * forecast year, and the terminal year assumes maintenance capex
 * (CAPEX = D&A). A non-positive terminal FCFF invalidates the whole
 * scenario; WACC ≤ g drops only the terminal value.
 */
export const projectScenario = (inputs: DcfInputs, scenario: GrowthScenario): DcfScenarioResult => {
  if (!isPresent(inputs.revenueTtm)) {
    return {
      enterpriseValue: null,
      explicitPeriodPV: 0,
      terminalFcff: null,
      terminalValuePV: null,
      projectedCashFlows: []
    };
  }

  const { ebitMargin, taxRate, capexPct, dAndAPct, nwcPct, wacc, years } = inputs;
  let revenue = inputs.revenueTtm;
  let nwc = nwcPct * revenue;
  let cumDiscountFactor = 1;
  let explicitPeriodPV = 0;
  const projectedCashFlows: ProjectedYear[] = [];

  for (let year = 1; year <= years; year++) {
    const nextRevenue = revenue * (1 + scenario.growth);
    const ebit = nextRevenue * ebitMargin;
    const nopat = ebit * (1 - taxRate);
    const dAndA = dAndAPct * nextRevenue;

    const capexPctForYear = capexPct - (capexPct - dAndAPct) * (year / years);
    const capex = capexPctForYear * nextRevenue;

    const nextNwc = nwcPct * nextRevenue;
    const deltaNwc = nextNwc - nwc;

    const freeCashFlow = nopat + dAndA - capex - deltaNwc;
    cumDiscountFactor /= (1 + wacc);
    const presentValue = freeCashFlow * cumDiscountFactor;
    explicitPeriodPV += presentValue;

    projectedCashFlows.push({
      year,
      revenue: nextRevenue,
      ebit,
      nopat,
      dAndA,
      capex,
      deltaNwc,
      freeCashFlow,
      presentValue
    });

    revenue = nextRevenue;
    nwc = nextNwc;
  }

  // Year N+1 grows at the terminal rate, not the explicit-period rate.
  const terminalRevenue = revenue * (1 + scenario.terminalGrowth);
  const terminalNopat = terminalRevenue * ebitMargin * (1 - taxRate);
  const terminalDAndA = dAndAPct * terminalRevenue;
  const terminalCapex = dAndAPct * terminalRevenue;
  const terminalDeltaNwc = nwcPct * terminalRevenue - nwc;
  const terminalFcff = terminalNopat + terminalDAndA - terminalCapex - terminalDeltaNwc;

  if (!Number.isFinite(terminalFcff) || terminalFcff <= 0) {
    return {
      enterpriseValue: null,
      explicitPeriodPV,
      terminalFcff: Number.isFinite(terminalFcff) ? terminalFcff : null,
      terminalValuePV: null,
      projectedCashFlows
    };
  }

  if (wacc <= scenario.terminalGrowth) {
    return {
      enterpriseValue: explicitPeriodPV,
      explicitPeriodPV,
      terminalFcff,
      terminalValuePV: null,
      projectedCashFlows
    };
  }

  const terminalValue = terminalFcff / (wacc - scenario.terminalGrowth);
  const terminalValuePV = terminalValue * cumDiscountFactor;

  return {
    enterpriseValue: explicitPeriodPV + terminalValuePV,
    explicitPeriodPV,
    terminalFcff,
    terminalValuePV,
    projectedCashFlows
  };
};

export const runDcf = (inputs: DcfInputs): Record<Scenario, DcfScenarioResult> => ({
  low: projectScenario(inputs, inputs.scenarios.low),
  base: projectScenario(inputs, inputs.scenarios.base),
  high: projectScenario(inputs, inputs.scenarios.high)
});

export const toValuationRange = (results: Record<Scenario, DcfScenarioResult>): ValuationRange => {
  const range: ValuationRange = {
    low: results.low.enterpriseValue,
    base: results.base.enterpriseValue,
    high: results.high.enterpriseValue
  };
  if (SCENARIOS.every((scenario) => range[scenario] === null)) {
    console.warn('All DCF scenarios invalid (missing revenue or non-positive terminal FCFF); no DCF valuation available');
  }
  return range;
};

export const dcfEv = (inputs: DcfInputs): ValuationRange => toValuationRange(runDcf(inputs));
