// INTERNAL ONLY – synthetic prospect personas for batch simulation.

import personas from "./data/prospectPersonas.json";
import {
  PROSPECT_INTENTS,
  type BigFiveTraits,
  type ObjectionType,
  type ProspectProfile,
  type ReadinessLevel,
} from "./types";

export type RandomSource = () => number;

const OBJECTIONS: readonly (ObjectionType | null)[] = [
  null,
  "price",
  "time_commitment",
  "injury_concerns",
  "intimidation_factor",
  "location_parking",
  "just_looking",
];

const READINESS_LEVELS: readonly ReadinessLevel[] = ["hot", "warm", "cold"];

const TRAIT_ORDER: readonly (keyof BigFiveTraits)[] = [
  "openness",
  "conscientiousness",
  "extraversion",
  "agreeableness",
  "neuroticism",
];

function pick<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

function randomTrait(random: RandomSource): number {
  return 1 + Math.min(9, Math.floor(random() * 10));
}

export function generateProspectProfile(random: RandomSource = Math.random): ProspectProfile {
  const bigFive: BigFiveTraits = {
    openness: randomTrait(random),
    conscientiousness: randomTrait(random),
    extraversion: randomTrait(random),
    agreeableness: randomTrait(random),
    neuroticism: randomTrait(random),
  };

  return {
    bigFive,
    trueIntent: pick(PROSPECT_INTENTS, random),
    objection: pick(OBJECTIONS, random),
    readiness: pick(READINESS_LEVELS, random),
    ageRange: pick(personas.ageRanges, random),
    fitnessBackground: pick(personas.fitnessBackgrounds, random),
  };
}

export type TraitLevel = "low" | "medium" | "high";

export function traitLevel(score: number): TraitLevel {
  if (score <= 3) return "low";
  if (score <= 7) return "medium";
  return "high";
}

/** System prompt that has the prospect model play `profile` without stating it outright. */
export function createProspectPrompt(profile: ProspectProfile): string {
  const traitLines = TRAIT_ORDER.map((trait) => {
    const score = profile.bigFive[trait];
    const level = traitLevel(score);
    const name = trait[0].toUpperCase() + trait.slice(1);
    return `- ${name}: ${score}/10 (${level.toUpperCase()}) - ${personas.traitDescriptions[trait][level]}`;
  });

  const concern = profile.objection
    ? `YOUR CONCERN: ${personas.objectionDescriptions[profile.objection]}`
    : "You have no major objections.";

  return `You are a potential gym member who filled out a web form to learn more about a boxing fitness gym.

PERSONALITY PROFILE (Big Five Traits):
${traitLines.join("\n")}

YOUR TRUE INTENT: ${personas.intentDescriptions[profile.trueIntent]}

HOW TO REVEAL YOUR INTENT NATURALLY:
${personas.behavioralCues[profile.trueIntent]}

YOUR READINESS: ${personas.readinessDescriptions[profile.readiness]}

DEMOGRAPHICS:
- Age range: ${profile.ageRange}
- Fitness background: ${profile.fitnessBackground}

${concern}

INSTRUCTIONS:
- You're texting/chatting - keep responses to 1-2 sentences maximum
- Respond naturally based on your personality traits
- Let your intent emerge through conversation using the behavioral cues above - don't explicitly say your intent
- Be realistic - show interest or skepticism based on your traits
- If you have concerns, let them surface naturally
- DO NOT mention your personality scores or state your intent directly`;
}
