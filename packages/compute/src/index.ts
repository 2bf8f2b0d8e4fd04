// ---------- Urgency + reorder math (stable public API) ----------
export {
  calculateUrgency,
  calculateSuggestedOrder,
} from "./urgency.js";

export type {
  UrgencyResult,
} from "./urgency.js";

// ---------- Classification (stable public API) ----------
export {
  classifyRows,
  processInventory,
} from "./classify.js";

export type {
  ClassificationResult,
} from "./classify.js";
