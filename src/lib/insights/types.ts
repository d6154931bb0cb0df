import type {
  Accessibility,
  CompetitionLevel,
  CustomerType,
  FootTraffic,
  Location,
  RentLevel,
  Sector,
} from "../benchmarks/types";

export type InsightType =
  | "critical_financial"
  | "underperformance_declining"
  | "performance_gap"
  | "top_performer"
  | "market_average"
  | "eroding_leader"
  | "mixed_signals";

export type InsightUrgency = "immediate" | "high" | "medium" | "low";

export type Insight = {
  type: InsightType;
  urgency: InsightUrgency;
  title: string;
  message: string;
  supporting_facts: string[];
  confidence: number;
};

export type ProblemType =
  | "revenue_decline"
  | "low_efficiency"
  | "market_underperformance"
  | "cash_flow"
  | "profitability"
  | "economic_headwinds"
  | "growth_stagnation"
  | "high_risk_exposure"
  | "revenue_volatility"
  | "productivity_gap";

export type OpportunityType =
  | "operational_efficiency"
  | "margin_improvement"
  | "market_expansion"
  | "seasonal_peak"
  | "strategic_investment"
  | "economic_timing"
  | "scale_operations"
  | "digital_transformation";

export type ProblemUrgency = "critical" | "high" | "medium" | "low";
export type Ease = "easy" | "medium" | "hard";

type FindingBase = {
  title: string;
  description: string;
  impact_amount: number;
  impact_score: number;
};

export type ProblemFinding = FindingBase & {
  kind: "problem";
  type: ProblemType;
  urgency: ProblemUrgency;
};

export type OpportunityFinding = FindingBase & {
  kind: "opportunity";
  type: OpportunityType;
  ease: Ease;
};

export type Finding = ProblemFinding | OpportunityFinding;

export type SpendingPower = "high" | "medium" | "low";

export type LocationOpportunity = {
  type: "premium_positioning" | "market_share_growth" | "sector_growth_area";
  title: string;
  description: string;
  timeframe: string;
};

export type LocationInsights = {
  location: Location;
  label: string;
  // true when the area has no reference entry and neutral traits were used
  reference_fallback: boolean;
  is_optimal_location: boolean;
  best_sectors: Sector[];
  location_score: number;
  key_insights: string[];
  advantages: string[];
  challenges: string[];
  customer_profile: {
    type: CustomerType;
    foot_traffic: FootTraffic;
    spending_power: SpendingPower;
  };
  cost_structure: {
    rent_level: RentLevel;
    rent_factor: number;
    competition_pressure: CompetitionLevel;
    accessibility: Accessibility;
  };
  success_factors: string[];
  revenue_volatility: {
    business: number;
    sector_typical: number;
    above_typical: boolean;
  };
  growth_opportunities: LocationOpportunity[];
};

export type InsightBundle = {
  primary: Insight;
  problems: ProblemFinding[];
  opportunities: OpportunityFinding[];
  location: LocationInsights;
};
