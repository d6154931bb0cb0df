import type { AnalysisResult } from "../analysis/types";
import type { ReferenceStore } from "../benchmarks/reference_store";
import type { BusinessSnapshot } from "../business/schema";
import { rankRecommendations } from "./immediate_actions";
import type { Recommendation } from "./types";

const HIGH_VOLATILITY = 0.2;

function formatProducts(products: readonly string[]) {
  return products.slice(0, 3).map((product) => product.replace(/_/g, " ")).join(", ");
}

function expansionActions(
  analysis: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): Recommendation[] {
  const revenue = analysis.performance_metrics.current_revenue;
  const sector = reference.sector(snapshot.sector).reference;
  const actions: Recommendation[] = [];

  const readiness = analysis.growth_analysis.readiness_level;
  if (readiness === "ready" || readiness === "highly_ready") {
    const targetKey = reference.location(snapshot.location).reference.expansion_target;
    const target = reference.location(targetKey).reference.label;
    actions.push({
      category: "location_expansion",
      title: `Open a second location in ${target}`,
      description: `The current model is proven; replicate it in ${target}.`,
      specific_actions: [
        `Scout premises in ${target}`,
        "Negotiate lease terms",
        "Hire and train a local manager",
        "Document and replicate current processes",
      ],
      expected_outcome: `Add about ${Math.round(revenue * 0.8)} in monthly revenue from the second site`,
      expected_amount: revenue * 0.8,
      timeframe: "4-6 months",
      difficulty: "hard",
      investment_required: sector.expansion_investment,
      impact_score: 85,
    });
  }

  const local = sector.local_expansion;
  if (local && local.locations.includes(snapshot.location)) {
    const amount = revenue * local.benefit_multiplier;
    actions.push({
      category: local.category,
      title: local.title,
      description: local.description,
      specific_actions: [...local.specific_actions],
      expected_outcome: `Add about ${Math.round(amount)} in monthly revenue`,
      expected_amount: amount,
      timeframe: local.timeframe,
      difficulty: local.difficulty,
      investment_required: local.investment_required,
      impact_score: local.impact_score,
    });
  }

  return actions;
}

function competitiveActions(analysis: AnalysisResult, snapshot: BusinessSnapshot): Recommendation[] {
  const competitive = analysis.competitive_analysis;
  const revenue = analysis.performance_metrics.current_revenue;
  const actions: Recommendation[] = [];

  if (competitive.intensity_label === "high") {
    actions.push({
      category: "differentiation",
      title: "Differentiate from nearby competitors",
      description: "Competition in this sector is intense; compete on specialization and service rather than price.",
      specific_actions: [
        "Pick one specialty the area lacks",
        "Set a service standard and train staff on it",
        "Collect and display customer reviews",
      ],
      expected_outcome: "Protect prices and win share from undifferentiated rivals",
      expected_amount: revenue * 0.1,
      timeframe: "2-3 months",
      difficulty: "medium",
      investment_required: 25000,
      impact_score: 72,
    });
  }

  if (competitive.productivity_ratio < 0.8) {
    const gap = Math.max(0, competitive.benchmark_productivity - analysis.performance_metrics.revenue_per_employee);
    actions.push({
      category: "process_improvement",
      title: "Raise revenue per employee",
      description: "Staff generate less revenue than the sector norm.",
      specific_actions: [
        "Map daily tasks and remove duplicated work",
        "Align shifts with peak trading hours",
        "Cross-train staff on sales and service",
      ],
      expected_outcome: "Close half of the productivity gap",
      expected_amount: gap * Math.max(1, snapshot.employee_count) * 0.5,
      timeframe: "1-2 months",
      difficulty: "medium",
      investment_required: 20000,
      impact_score: 68,
    });
  }

  return actions;
}

function businessModelActions(
  analysis: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): Recommendation[] {
  const revenue = analysis.performance_metrics.current_revenue;
  const sector = reference.sector(snapshot.sector).reference;
  const actions: Recommendation[] = [];

  if (analysis.performance_metrics.revenue_volatility > HIGH_VOLATILITY) {
    actions.push({
      category: "revenue_smoothing",
      title: "Smooth out monthly revenue swings",
      description: "Revenue varies widely between months, which strains cash planning.",
      specific_actions: [
        "Offer pre-orders and advance bookings for slow months",
        "Add a recurring service or subscription line",
        "Plan stock purchases around the seasonal calendar",
      ],
      expected_outcome: "Steadier monthly revenue and cash flow",
      expected_amount: revenue * 0.08,
      timeframe: "3 months",
      difficulty: "medium",
      investment_required: 15000,
      impact_score: 66,
    });
  }

  actions.push({
    category: "product_mix",
    title: "Grow the share of high-margin products",
    description: `Lines such as ${formatProducts(sector.high_margin_products)} carry the best margins in this sector.`,
    specific_actions: [
      "Give high-margin lines prominent display",
      "Bundle them with everyday items",
      "Train staff to recommend them",
    ],
    expected_outcome: "Higher average margin per sale",
    expected_amount: revenue * 0.1,
    timeframe: "2-3 months",
    difficulty: "easy",
    investment_required: 30000,
    impact_score: 64,
  });

  return actions;
}

export function buildStrategicActions(
  analysis: AnalysisResult,
  snapshot: BusinessSnapshot,
  reference: ReferenceStore
): Recommendation[] {
  return rankRecommendations([
    ...expansionActions(analysis, snapshot, reference),
    ...businessModelActions(analysis, snapshot, reference),
    ...competitiveActions(analysis, snapshot),
  ]);
}
