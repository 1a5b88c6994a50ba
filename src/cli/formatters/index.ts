import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { OutputFormat } from '../../core/config/schema.js';
import type { IFormatter, FormatOptions } from './types.js';

export * from './types.js';
export { HumanFormatter, formatCounts } from './human.js';
export { JsonFormatter } from './json.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}
