import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { CompactFormatter } from './compact.js';
import type { FormatOptions, IFormatter, OutputFormat } from './types.js';

export * from './types.js';
export { HumanFormatter, JsonFormatter, CompactFormatter };

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'compact':
      return new CompactFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}
