import { FAILURE_TYPES } from "./services/failure-simulator.js";

const MAX_DEPTH_LIMIT = 20;

const resourceIdParams = {
  type: "object" as const,
  required: ["id"],
  properties: {
    id: { type: "string" as const, minLength: 1 },
  },
};

const maxDepthProperty = { type: "integer" as const, minimum: 0, maximum: MAX_DEPTH_LIMIT };
const unitInterval = { type: "number" as const, minimum: 0, maximum: 1 };

export const dependenciesSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      direction: { type: "string" as const, enum: ["outgoing", "incoming", "both"], default: "outgoing" },
      maxDepth: maxDepthProperty,
      category: { type: "string" as const, minLength: 1 },
    },
  },
};

export const blastRadiusSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      maxDepth: maxDepthProperty,
      category: { type: "string" as const, minLength: 1 },
    },
  },
};

export const riskAssessmentSchema = {
  params: resourceIdParams,
};

export const comprehensiveSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      currentLoad: unitInterval,
    },
  },
};

export const simulateSchema = {
  body: {
    type: "object" as const,
    additionalProperties: false as const,
    required: ["resourceId", "failureType"],
    properties: {
      resourceId: { type: "string" as const, minLength: 1 },
      failureType: { type: "string" as const, enum: [...FAILURE_TYPES] },
      currentLoad: unitInterval,
      failureFrequency: unitInterval,
      affectedZones: {
        type: "array" as const,
        minItems: 1,
        maxItems: 20,
        items: { type: "string" as const, minLength: 1 },
      },
      totalZones: { type: "integer" as const, minimum: 1, maximum: 20 },
    },
  },
};

export const cascadingFailureSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      initialProbability: unitInterval,
    },
  },
};

export const compareSchema = {
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    required: ["ids"],
    properties: {
      ids: { type: "string" as const, minLength: 1, pattern: "\\S" },
    },
  },
};

export const upstreamHealthSchema = {
  params: resourceIdParams,
};

export const changeRiskSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      at: { type: "string" as const, format: "date-time" },
    },
  },
};

export const deploymentWindowsSchema = {
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      from: { type: "string" as const, format: "date-time" },
      days: { type: "integer" as const, minimum: 1, maximum: 30, default: 7 },
    },
  },
};

const nonNegative = { type: "number" as const, minimum: 0 };

export const costImpactSchema = {
  params: resourceIdParams,
  querystring: {
    type: "object" as const,
    additionalProperties: false as const,
    properties: {
      downtimeHours: nonNegative,
      affectedUsers: { type: "integer" as const, minimum: 0 },
      revenueGenerating: { type: "boolean" as const },
      hasSla: { type: "boolean" as const },
      industry: { type: "string" as const, minLength: 1 },
      annualRevenue: nonNegative,
      failureProbability: unitInterval,
      mttrHours: nonNegative,
    },
  },
};

export const mitigationCostsSchema = {
  body: {
    type: "object" as const,
    additionalProperties: false as const,
    required: ["currentRiskCost", "options"],
    properties: {
      currentRiskCost: nonNegative,
      options: {
        type: "array" as const,
        minItems: 1,
        maxItems: 50,
        items: {
          type: "object" as const,
          additionalProperties: false as const,
          required: ["name", "implementationCost", "annualOperationalCost", "riskReductionPercentage"],
          properties: {
            name: { type: "string" as const, minLength: 1 },
            implementationCost: nonNegative,
            annualOperationalCost: nonNegative,
            riskReductionPercentage: { type: "number" as const, minimum: 0, maximum: 100 },
          },
        },
      },
    },
  },
};
