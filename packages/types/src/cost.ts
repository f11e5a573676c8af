/** Body of `GET .../providers/Microsoft.Consumption/usageDetails`. */
export type UsageDetailsDocument = {
  value?: unknown;
  nextLink?: string;
};

export type UsageRecord = {
  usageStart: string;
  pretaxCost: string;
};

export type CostRow =
  | { kind: "record"; record: UsageRecord }
  | { kind: "invalid" };
