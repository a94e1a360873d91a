import * as yaml from 'js-yaml';

/**
 * Reference to a blueprint input, dumped as `!input <name>`.
 */
export class InputReference {
  constructor(readonly name: string) {}
}

const inputType = new yaml.Type('!input', {
  kind: 'scalar',
  instanceOf: InputReference,
  construct: (data: unknown) => new InputReference(String(data)),
  represent: (data: object) => (data instanceof InputReference ? data.name : String(data)),
});

export const HELPER_SCHEMA = yaml.DEFAULT_SCHEMA.extend([inputType]);

export function formatYaml(value: unknown): string {
  const text = yaml.dump(value, {
    schema: HELPER_SCHEMA,
    indent: 2,
    flowLevel: -1,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });

  return text.endsWith('\n') ? text : `${text}\n`;
}

export function parseYaml(text: string): unknown {
  return yaml.load(text, { schema: HELPER_SCHEMA });
}

/**
 * Prefixes every line of `text` with "# ". Blank lines become a bare "#".
 */
export function formatCommentHeader(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map((line) => (line.trim() ? `# ${line}` : '#'))
      .join('\n') + '\n'
  );
}
