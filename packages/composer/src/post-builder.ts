import { PostComposer } from './composer.js';
import type { Theme } from './themes/theme.js';

/** Ready-made post patterns. Each returns a composer that can still be extended. */

export interface ThoughtLeadershipInput {
  hookStat: string;
  frameworkName: string;
  frameworkParts: string[];
  conclusion: string;
}

export interface StoryInput {
  hook: string;
  problem: string;
  journey: string;
  solution: string;
  lesson: string;
}

export interface ListicleInput {
  hook: string;
  items: string[];
  conclusion: string;
}

export interface ComparisonInput {
  hook: string;
  optionA: string;
  optionB: string;
  recommendation: string;
}

export const POST_PATTERNS = ['thought_leadership', 'story', 'listicle', 'comparison'] as const;
export type PostPattern = (typeof POST_PATTERNS)[number];

export function thoughtLeadershipPost(input: ThoughtLeadershipInput, theme?: Theme): PostComposer {
  return new PostComposer({ theme })
    .addHook('stat', input.hookStat)
    .addBody(`Here's the ${input.frameworkName}:`, 'linear')
    .addBody(input.frameworkParts.join('||'), 'framework')
    .addSeparator('line')
    .addBody(input.conclusion, 'linear')
    .addCta('curiosity', 'Which resonates most with you?')
    .addHashtags([input.frameworkName.replace(/ /g, ''), 'Leadership', 'Strategy']);
}

export function storyPost(input: StoryInput, theme?: Theme): PostComposer {
  return new PostComposer({ theme })
    .addHook('story', input.hook)
    .addBody([input.problem, input.journey, input.solution].join('\n\n'), 'story_arc')
    .addSeparator('dots')
    .addBody(`The lesson: ${input.lesson}`, 'linear')
    .addCta('soft', 'Have you experienced something similar?');
}

export function listiclePost(input: ListicleInput, theme?: Theme): PostComposer {
  return new PostComposer({ theme })
    .addHook('list', input.hook)
    .addBody(input.items.join('\n'), 'listicle')
    .addSeparator('wave')
    .addBody(input.conclusion, 'linear')
    .addCta('action', 'Save this for later');
}

export function comparisonPost(input: ComparisonInput, theme?: Theme): PostComposer {
  return new PostComposer({ theme })
    .addHook('question', input.hook)
    .addBody(`${input.optionA}||${input.optionB}`, 'comparison')
    .addSeparator('line')
    .addBody(`My take: ${input.recommendation}`, 'linear')
    .addCta('curiosity', 'Which would you choose?');
}
