import { Generation, GenerationRule } from '../types/enums.js';

export function classifyGenerationTag(label: string): Generation {
  if (label === Generation.GEN1) return Generation.GEN1;
  if (label === Generation.GEN2) return Generation.GEN2;
  return Generation.UNKNOWN;
}

// Case-sensitive substring match: `Type1`, `Type1dot1` are Gen1; `Type3`, `Type3dot1` are Gen2.
export function classifyRewardType(code: string): Generation {
  if (code.includes('Type1')) return Generation.GEN1;
  if (code.includes('Type3')) return Generation.GEN2;
  return Generation.UNKNOWN;
}

export function classifyWith(rule: GenerationRule, label: string): Generation {
  switch (rule) {
    case GenerationRule.TAG:
      return classifyGenerationTag(label);
    case GenerationRule.REWARD_TYPE:
      return classifyRewardType(label);
  }
}
