import { z } from 'zod';
import type { Classifier } from '../classifier/classifier.js';
import { CATEGORIES, DEFAULT_CATEGORY, categoryLabel } from '../memory/types.js';

// Tool input schemas
const MAX_TEXT_LENGTH = 2000;

const CategorySchema = z.enum(CATEGORIES).optional().default(DEFAULT_CATEGORY);

const ScoreSchema = z.object({
  text: z.string().min(1).max(MAX_TEXT_LENGTH),
});

const DecideSchema = z.object({
  text: z.string().min(1).max(MAX_TEXT_LENGTH),
  category: CategorySchema,
});

const LabelSchema = z.object({
  text: z.string().min(1).max(MAX_TEXT_LENGTH),
  safe: z.boolean(),
  category: CategorySchema,
});

const RespondSchema = z.object({
  prompt: z.string().min(1).max(MAX_TEXT_LENGTH),
  category: CategorySchema,
});

const ListSchema = z.object({
  category: z.enum(CATEGORIES).optional(),
});

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const categoryProperty = {
  type: 'string',
  enum: [...CATEGORIES],
  description: 'Content category (default: phrases)',
};

export const tools = [
  {
    name: 'banline_score',
    description: 'Score text from 0 (safe) to 1 (inappropriate for kids). Scores at or above the ban line are banned.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Text to score' },
      },
      required: ['text'],
    },
  },
  {
    name: 'banline_decide',
    description: 'Let the classifier decide. Safe text is remembered and lightly reinforced; banned text is left for a human to override.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Text to classify' },
        category: categoryProperty,
      },
      required: ['text'],
    },
  },
  {
    name: 'banline_label',
    description: 'Label text as safe or bad. Overrides any earlier decision and retrains the classifier.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Text to label' },
        safe: { type: 'boolean', description: 'true if the text is OK for kids' },
        category: categoryProperty,
      },
      required: ['text', 'safe'],
    },
  },
  {
    name: 'banline_respond',
    description: 'Find the closest remembered item to a prompt.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        prompt: { type: 'string', description: 'Prompt to match' },
        category: categoryProperty,
      },
      required: ['prompt'],
    },
  },
  {
    name: 'banline_list',
    description: 'List remembered (allowed) items.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        category: { ...categoryProperty, description: 'Only this category (default: all)' },
      },
    },
  },
];

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function verdict(classifier: Classifier, score: number): string {
  return `${score.toFixed(3)} (${classifier.isBanned(score) ? 'INAPPROPRIATE' : 'SAFE'})`;
}

/**
 * Dispatch a tool call against `classifier`. `onChange` runs after every
 * call that may have changed memory.
 */
export function createToolHandler(
  classifier: Classifier,
  onChange: () => void
): (name: string, args: unknown) => ToolResult {
  return (name, args) => {
    try {
      switch (name) {
        case 'banline_score': {
          const input = ScoreSchema.parse(args);
          return text(`Score: ${verdict(classifier, classifier.score(input.text))}`);
        }

        case 'banline_decide': {
          const input = DecideSchema.parse(args);
          const decision = classifier.aiDecide(input.text, input.category);
          onChange();
          return text(
            `AI says: ${verdict(classifier, decision.score)}. ` +
              (decision.safe ? 'Added.' : 'Not added (override with banline_label if wrong).')
          );
        }

        case 'banline_label': {
          const input = LabelSchema.parse(args);
          const outcome = classifier.setLabel(input.text, input.safe, input.category);
          onChange();
          return text(`${outcome.message}\nScore now: ${verdict(classifier, outcome.score)}`);
        }

        case 'banline_respond': {
          const input = RespondSchema.parse(args);
          const match = classifier.findMatch(input.prompt, input.category);
          return text(
            match
              ? `${match.text}\n(similarity ${match.similarity.toFixed(2)})`
              : 'No close match found.'
          );
        }

        case 'banline_list': {
          const input = ListSchema.parse(args ?? {});
          const categories = input.category ? [input.category] : CATEGORIES;
          const sections = categories.map((category) => {
            const items = classifier.list(category);
            const lines = items.length > 0 ? items.map((item) => `- ${item}`) : ['(none)'];
            return [`${categoryLabel(category)}:`, ...lines].join('\n');
          });
          return text(sections.join('\n\n'));
        }

        default:
          return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
      }
    } catch (error) {
      return {
        content: [
          {
            type: 'text',
            text: `Error: ${error instanceof Error ? error.message : 'Unknown error'}`,
          },
        ],
        isError: true,
      };
    }
  };
}
