/**
 * @fileOverview Token-classification style skill tagging for one bounded text chunk.
 *
 * - createGenkitEntityTagger - Defines the tagging prompt and flow on a Genkit instance.
 * - TagSkillEntitiesInput - The input type for the tagging flow.
 * - TagSkillEntitiesOutput - The return type for the tagging flow.
 */

import { z, type Genkit } from 'genkit';
import type { EntityTagger } from '@/lib/types';

export const ENTITY_LABELS = [
  'SKILL',
  'TECHNOLOGY',
  'TOOL',
  'CERTIFICATION',
  'PERSON',
  'ORGANIZATION',
  'LOCATION',
  'OTHER',
] as const;

const TagSkillEntitiesInputSchema = z.object({
  chunk: z.string().describe('A short excerpt of a resume or job description.'),
});
export type TagSkillEntitiesInput = z.infer<typeof TagSkillEntitiesInputSchema>;

const TagSkillEntitiesOutputSchema = z.object({
  entities: z
    .array(
      z.object({
        label: z.enum(ENTITY_LABELS),
        surfaceForm: z.string().describe('The entity exactly as written in the excerpt.'),
      })
    )
    .describe('Entities found in the excerpt, in reading order.'),
});
export type TagSkillEntitiesOutput = z.infer<typeof TagSkillEntitiesOutputSchema>;

export function createGenkitEntityTagger(ai: Genkit): EntityTagger {
  const prompt = ai.definePrompt({
    name: 'tagSkillEntitiesPrompt',
    input: { schema: TagSkillEntitiesInputSchema },
    output: { schema: TagSkillEntitiesOutputSchema },
    config: { temperature: 0 },
    prompt: `You are a named-entity tagger for recruiting text.

Label every entity in the excerpt below with exactly one of:
SKILL, TECHNOLOGY, TOOL, CERTIFICATION, PERSON, ORGANIZATION, LOCATION, OTHER.

Rules:
- SKILL: a capability or method (e.g. "data modeling", "stakeholder management").
- TECHNOLOGY / TOOL: languages, frameworks, platforms, products (e.g. "Python", "Kubernetes", "Excel").
- Copy each surface form exactly as it appears. Do not invent entities.
- If nothing qualifies, return an empty "entities" array.

Excerpt:
{{{chunk}}}`,
  });

  const tagSkillEntitiesFlow = ai.defineFlow(
    {
      name: 'tagSkillEntitiesFlow',
      inputSchema: TagSkillEntitiesInputSchema,
      outputSchema: TagSkillEntitiesOutputSchema,
    },
    async input => {
      const { output } = await prompt(input);
      return output ?? { entities: [] };
    }
  );

  return {
    async tagEntities(chunk) {
      const { entities } = await tagSkillEntitiesFlow({ chunk });
      return entities;
    },
  };
}
