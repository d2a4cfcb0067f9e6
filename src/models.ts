export type ModelOption = {
  id: string;
  label: string;
  description: string;
  supportsStreaming: boolean;
  supportsTools: boolean;
  supportsReasoning: boolean;
  maxTokens: number;
};

const DEFAULT_MAX_TOKENS = 8192;

export const MODEL_OPTIONS: readonly ModelOption[] = [
  {
    id: "openai/gpt-oss-20b",
    label: "GPT-OSS 20B",
    description: "standard 20B parameter model",
    supportsStreaming: true,
    supportsTools: false,
    supportsReasoning: true,
    maxTokens: DEFAULT_MAX_TOKENS,
  },
  {
    id: "openai/gpt-oss-120b",
    label: "GPT-OSS 120B",
    description: "larger 120B parameter model",
    supportsStreaming: true,
    supportsTools: false,
    supportsReasoning: true,
    maxTokens: DEFAULT_MAX_TOKENS,
  },
  {
    id: "compound-beta",
    label: "Compound Beta",
    description: "web search and code execution, several tools per answer",
    supportsStreaming: false,
    supportsTools: true,
    supportsReasoning: false,
    maxTokens: DEFAULT_MAX_TOKENS,
  },
  {
    id: "compound-beta-mini",
    label: "Compound Beta Mini",
    description: "web search and code execution, one tool per answer",
    supportsStreaming: false,
    supportsTools: true,
    supportsReasoning: false,
    maxTokens: DEFAULT_MAX_TOKENS,
  },
];

export function findModel(modelId: string): ModelOption | undefined {
  const needle = modelId.trim().toLowerCase();
  return MODEL_OPTIONS.find((model) => model.id.toLowerCase() === needle);
}

/** Catalog entry for `modelId`; ids the catalog does not know get a streaming-only default. */
export function describeModel(modelId: string): ModelOption {
  const known = findModel(modelId);
  if (known) {
    return { ...known };
  }
  const id = modelId.trim();
  return {
    id,
    label: modelIdToLabel(id) || id,
    description: "unknown model",
    supportsStreaming: true,
    supportsTools: false,
    supportsReasoning: false,
    maxTokens: DEFAULT_MAX_TOKENS,
  };
}

export function modelIdToLabel(modelId: string): string {
  return modelIdToSlug(modelId).replace(/[-_]+/g, " ");
}

export function modelIdToSlug(modelId: string): string {
  const trimmed = modelId.trim();
  const slashIndex = trimmed.lastIndexOf("/");
  return slashIndex >= 0 ? trimmed.slice(slashIndex + 1) : trimmed;
}
