import { z } from "zod";
import {
  isMentionGeneratorInput,
  resolveMentionGenerator,
  type MentionGeneratorInput,
} from "./extensions/mention/mention-generator";

const DELIMITED_REGEX = /^\/[\s\S]*\/[a-z]*$/;

function compiles(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const mentionPatternSchema = z
  .string()
  .min(1)
  .refine((pattern) => !DELIMITED_REGEX.test(pattern), {
    message: "must be a regular expression fragment without delimiters or flags",
  })
  .refine(compiles, { message: "is not a valid regular expression" });

const mentionGeneratorSchema = z
  .custom<MentionGeneratorInput>(isMentionGeneratorInput, {
    message: "must be a URL template string, a function or an object with a generateMention() method",
  })
  .transform(resolveMentionGenerator);

const mentionSchema = z
  .object({
    symbol: z.never({ invalid_type_error: 'the "symbol" option has been replaced by "prefix"' }).optional(),
    prefix: z.string().min(1),
    pattern: mentionPatternSchema,
    generator: mentionGeneratorSchema,
  })
  .strict();

export const mentionsConfigSchema = z.record(z.string(), mentionSchema).default({});

export type MentionsConfig = z.output<typeof mentionsConfigSchema>;
export type MentionConfigInput = z.input<typeof mentionSchema>;

const quoteCharacter = z.string().length(1);

export const smartPunctConfigSchema = z
  .object({
    double_quote_opener: quoteCharacter.default("“"),
    double_quote_closer: quoteCharacter.default("”"),
    single_quote_opener: quoteCharacter.default("‘"),
    single_quote_closer: quoteCharacter.default("’"),
  })
  .strict()
  .default({});

export type SmartPunctConfig = z.output<typeof smartPunctConfigSchema>;

/** Shape accepted by `Environment` and `MarkdownConverter`; unknown top-level keys pass through. */
export interface MarkdownParserConfig {
  mentions?: Record<string, MentionConfigInput>;
  smartpunct?: z.input<typeof smartPunctConfigSchema>;
  [key: string]: unknown;
}
