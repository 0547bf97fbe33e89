import type { PracticeLevel } from './types';

export interface InformationPromptInput {
  religion: string;
  /** Human-readable category description; omitted for the general overview. */
  categoryDescription?: string;
  query?: string;
}

export function buildInformationPrompt(input: InformationPromptInput): string {
  let prompt = `Provide accurate, respectful, and educational information about ${titleCase(input.religion)} `;

  prompt += input.categoryDescription
    ? `focusing on ${input.categoryDescription}. `
    : 'covering its core beliefs, practices, and principles. ';

  if (input.query) {
    prompt += `Specifically address this question: ${input.query}`;
  }

  return (
    prompt +
    structure('Please structure your response with these sections when applicable:', [
      'Core Beliefs',
      'Key Practices',
      'Sacred Texts',
      'Historical Context',
      'Modern Interpretation',
    ])
  );
}

export function buildPerspectivePrompt(philosophy: string, topic?: string): string {
  let prompt = `Provide an educational explanation of ${philosophy} philosophy `;

  prompt += topic
    ? `specifically addressing: ${topic}. `
    : 'covering its key principles, notable thinkers, and practical applications. ';

  return (
    prompt +
    structure('Please structure your response with these sections:', [
      'Core Principles',
      'Key Thinkers',
      'Historical Context',
      'Modern Relevance',
      'Practical Applications',
    ])
  );
}

export function buildComparisonPrompt(religion1: string, religion2: string, aspect: string): string {
  const first = titleCase(religion1);
  const second = titleCase(religion2);

  let prompt = `Provide a respectful, educational, and balanced comparison between ${first} and ${second} `;

  prompt +=
    aspect === 'general'
      ? 'covering their core beliefs, practices, and historical contexts. '
      : `focusing specifically on their ${aspect}. `;

  return (
    prompt +
    structure('Please structure your response with these sections:', [
      `${first} Overview`,
      `${second} Overview`,
      'Key Similarities',
      'Notable Differences',
      'Historical Interactions',
      'Modern Coexistence',
    ])
  );
}

export interface DailyInsightPromptInput {
  /** `religion` or `philosophy` when the tradition is in the catalog. */
  traditionKind?: 'religion' | 'philosophy';
  tradition?: string;
  theme?: string;
}

export function buildDailyInsightPrompt(input: DailyInsightPromptInput): string {
  let prompt = 'Provide an inspiring and thought-provoking spiritual insight for today ';

  if (input.tradition && input.traditionKind === 'religion') {
    prompt += `from the ${titleCase(input.tradition)} tradition `;
  } else if (input.tradition && input.traditionKind === 'philosophy') {
    prompt += `from ${titleCase(input.tradition)} philosophy `;
  }

  prompt += input.theme
    ? `focusing on the theme of ${input.theme}. `
    : 'that encourages reflection and personal growth. ';

  return (
    prompt +
    structure('Please include:', [
      'A meaningful quote or saying',
      'The source or attribution',
      'A brief reflection (2-3 sentences)',
      'A simple practice or contemplation for the day',
    ])
  );
}

export interface MeditationPromptInput extends DailyInsightPromptInput {
  duration: number;
  focus: string;
}

export function buildMeditationPrompt(input: MeditationPromptInput): string {
  let prompt = `Create a ${input.duration}-minute guided meditation script `;

  if (input.tradition && input.traditionKind === 'religion') {
    prompt += `based on ${titleCase(input.tradition)} practices `;
  } else if (input.tradition && input.traditionKind === 'philosophy') {
    prompt += `inspired by ${titleCase(input.tradition)} philosophy `;
  }

  prompt += `focusing on ${input.focus}. `;

  return (
    prompt +
    structure('Please structure the meditation guide with:', [
      'A brief introduction explaining the benefits and context',
      'Preparation instructions',
      'Step-by-step meditation guidance with appropriate timing',
      'A gentle conclusion',
      'Suggestions for integrating the practice into daily life',
    ])
  );
}

export function buildInterfaithPrompt(topic: string, religions: readonly string[]): string {
  const prompt = `Create an educational interfaith dialogue on the topic of '${topic}' between representatives of ${joinNames(religions.map(titleCase))}. `;

  return (
    prompt +
    structure('Please structure the dialogue to:', [
      "Respectfully represent each tradition's perspective",
      'Highlight areas of agreement and disagreement',
      'Demonstrate mutual respect and understanding',
      'Conclude with insights gained from the dialogue',
    ])
  );
}

export function buildPracticePrompt(practice: string, level: PracticeLevel, tradition?: string): string {
  let prompt = `Create a ${level} level guide for the spiritual practice of ${practice} `;

  prompt += tradition
    ? `in the ${titleCase(tradition)} tradition. `
    : 'that is accessible to people of various spiritual backgrounds. ';

  return (
    prompt +
    structure('Please structure the guide with:', [
      'Introduction and benefits',
      'Historical and spiritual context',
      'Step-by-step instructions',
      'Common challenges and solutions',
      'Tips for deepening the practice',
      'Resources for further learning',
    ])
  );
}

export function titleCase(value: string): string {
  return value.replace(/\b([a-z])/g, (letter) => letter.toUpperCase());
}

/** `A and B`, or `A, B, and C` for longer lists. */
export function joinNames(names: readonly string[]): string {
  if (names.length <= 2) {
    return names.join(' and ');
  }

  return `${names.slice(0, -1).join(', ')}, and ${names[names.length - 1]}`;
}

function structure(heading: string, items: readonly string[]): string {
  const numbered = items.map((item, index) => `${index + 1}. ${item}`).join('\n');
  return `\n\n${heading}\n${numbered}`;
}
