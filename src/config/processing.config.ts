import path from 'path';

export const PROCESSING_MODES = ['hybrid', 'complete_llm'] as const;
export type ProcessingMode = typeof PROCESSING_MODES[number];

export const LLM_PROVIDERS = ['openai', 'groq', 'anthropic'] as const;
export type LlmProvider = typeof LLM_PROVIDERS[number];

export const PROVIDER_PREFERENCES = [...LLM_PROVIDERS, 'auto'] as const;
export type ProviderPreference = typeof PROVIDER_PREFERENCES[number];

export type CostTier = 'free' | 'premium';

export type FileComplexity = 'low' | 'medium' | 'high';

export type ProviderAvailability = Record<LlmProvider, boolean>;

export const DEFAULT_PROCESSING_MODE: ProcessingMode = 'hybrid';
export const DEFAULT_PROVIDER_PRIORITY: readonly LlmProvider[] = ['groq', 'openai', 'anthropic'];

const BYTES_PER_MB = 1024 * 1024;

export interface RuleConditions {
  fileSizeMb?: { op: '>' | '<'; threshold: number };
  fileExtensions?: string[];
  complexity?: FileComplexity;
}

export interface ProcessingRule {
  name: string;
  mode: ProcessingMode;
  preferredProviders: LlmProvider[];
  description: string;
  conditions: RuleConditions;
}

// Evaluated in order; the first matching rule wins.
export const PROCESSING_RULES: readonly ProcessingRule[] = [
  {
    name: 'large_files',
    mode: 'complete_llm',
    preferredProviders: ['openai', 'anthropic'],
    description: 'Large files (>5MB) benefit from direct LLM processing',
    conditions: { fileSizeMb: { op: '>', threshold: 5 } }
  },
  {
    name: 'pdf_files',
    mode: 'complete_llm',
    preferredProviders: ['openai', 'anthropic'],
    description: 'PDF files often need the document understanding of advanced LLMs',
    conditions: { fileExtensions: ['.pdf'] }
  },
  {
    name: 'docx_files',
    mode: 'hybrid',
    preferredProviders: ['groq', 'openai'],
    description: 'DOCX files extract well with libraries, hybrid is efficient',
    conditions: { fileExtensions: ['.docx'] }
  },
  {
    name: 'small_text_files',
    mode: 'hybrid',
    preferredProviders: ['groq'],
    description: 'Small text files are perfect for fast hybrid processing',
    conditions: { fileSizeMb: { op: '<', threshold: 1 }, fileExtensions: ['.txt'] }
  },
  {
    name: 'complex_resumes',
    mode: 'complete_llm',
    preferredProviders: ['openai', 'anthropic'],
    description: 'Complex layouts need advanced LLM understanding',
    conditions: { complexity: 'high' }
  }
];

export interface ProviderProfile {
  name: string;
  strengths: string[];
  limitations: string[];
  bestFor: string[];
  costTier: CostTier;
  supportsFileUpload: boolean;
}

export const PROVIDER_PROFILES: Record<LlmProvider, ProviderProfile> = {
  groq: {
    name: 'Groq',
    strengths: ['speed', 'cost_effective', 'text_processing'],
    limitations: ['no_file_upload', 'rate_limits'],
    bestFor: ['hybrid_mode', 'text_extraction', 'quick_processing'],
    costTier: 'free',
    supportsFileUpload: false
  },
  openai: {
    name: 'OpenAI GPT-4',
    strengths: ['file_upload', 'comprehensive_analysis', 'accuracy'],
    limitations: ['cost', 'rate_limits'],
    bestFor: ['complete_llm', 'pdf_processing', 'complex_analysis'],
    costTier: 'premium',
    supportsFileUpload: true
  },
  anthropic: {
    name: 'Claude',
    strengths: ['large_context', 'detailed_analysis', 'file_upload'],
    limitations: ['cost', 'availability'],
    bestFor: ['complete_llm', 'detailed_extraction', 'large_documents'],
    costTier: 'premium',
    supportsFileUpload: true
  }
};

export const PRESET_NAMES = ['speed', 'accuracy', 'cost', 'dev', 'prod'] as const;
export type PresetName = typeof PRESET_NAMES[number];

export interface ProcessingSettings {
  processingMode: ProcessingMode;
  providerPriority: LlmProvider[];
  costOptimization: boolean;
  autoFallback: boolean;
}

export const CONFIG_PRESETS: Record<PresetName, ProcessingSettings> = {
  speed: {
    processingMode: 'hybrid',
    providerPriority: ['groq', 'openai', 'anthropic'],
    costOptimization: true,
    autoFallback: true
  },
  accuracy: {
    processingMode: 'complete_llm',
    providerPriority: ['openai', 'anthropic', 'groq'],
    costOptimization: false,
    autoFallback: true
  },
  cost: {
    processingMode: 'hybrid',
    providerPriority: ['groq', 'openai', 'anthropic'],
    costOptimization: true,
    autoFallback: true
  },
  dev: {
    processingMode: 'hybrid',
    providerPriority: ['groq', 'openai'],
    costOptimization: true,
    autoFallback: true
  },
  prod: {
    processingMode: 'complete_llm',
    providerPriority: ['openai', 'anthropic', 'groq'],
    costOptimization: false,
    autoFallback: true
  }
};

export function isProcessingMode(value: string): value is ProcessingMode {
  return (PROCESSING_MODES as readonly string[]).includes(value);
}

export function isLlmProvider(value: string): value is LlmProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

export function isPresetName(value: string): value is PresetName {
  return (PRESET_NAMES as readonly string[]).includes(value);
}

/**
 * Parses a comma separated provider list. `auto` expands in place to the
 * default order and repeated names keep their first position.
 * Throws on an unknown provider name.
 */
export function parseProviderPriority(raw: string): LlmProvider[] {
  const names = raw
    .split(',')
    .map(name => name.trim().toLowerCase())
    .filter(name => name.length > 0);

  if (names.length === 0) {
    throw new Error('Provider priority cannot be empty');
  }

  const ordered: LlmProvider[] = [];
  for (const name of names) {
    const expanded = name === 'auto' ? [...DEFAULT_PROVIDER_PRIORITY] : [name];
    for (const candidate of expanded) {
      if (!isLlmProvider(candidate)) {
        throw new Error(`Invalid provider '${candidate}'. Valid options: ${PROVIDER_PREFERENCES.join(', ')}`);
      }
      if (!ordered.includes(candidate)) {
        ordered.push(candidate);
      }
    }
  }
  return ordered;
}

export function fileExtensionOf(fileName: string): string {
  return path.extname(fileName.toLowerCase());
}

export function bytesToMb(sizeBytes: number): number {
  return sizeBytes / BYTES_PER_MB;
}

export function estimateFileComplexity(fileName: string, sizeBytes: number): FileComplexity {
  const sizeMb = bytesToMb(sizeBytes);
  if (sizeMb > 5) {
    return 'high';
  }
  if (sizeMb > 2) {
    return 'medium';
  }
  return fileExtensionOf(fileName) === '.pdf' ? 'medium' : 'low';
}

function matchesConditions(conditions: RuleConditions, fileName: string, sizeBytes: number): boolean {
  const extension = fileExtensionOf(fileName);
  const sizeMb = bytesToMb(sizeBytes);

  if (conditions.fileExtensions && !conditions.fileExtensions.includes(extension)) {
    return false;
  }

  if (conditions.fileSizeMb) {
    const { op, threshold } = conditions.fileSizeMb;
    if (op === '>' && sizeMb <= threshold) {
      return false;
    }
    if (op === '<' && sizeMb >= threshold) {
      return false;
    }
  }

  if (conditions.complexity && estimateFileComplexity(fileName, sizeBytes) !== conditions.complexity) {
    return false;
  }

  return true;
}

export function evaluateFileRules(fileName: string, sizeBytes: number): ProcessingRule | null {
  return PROCESSING_RULES.find(rule => matchesConditions(rule.conditions, fileName, sizeBytes)) ?? null;
}
