/**
 * Service descriptor template
 *
 * A template is an opaque body with three named slots. Each slot is the
 * single line starting with its directive; every other line passes through
 * byte for byte.
 */

import { PreconditionError, type ServiceDescriptor } from '@kneeboard/ipc';

export const SERVICE_DIRECTIVES = ['ExecStart', 'WorkingDirectory', 'User'] as const;

export type ServiceDirective = (typeof SERVICE_DIRECTIVES)[number];

type SlotIndex = Record<ServiceDirective, number>;

function directivePattern(directive: ServiceDirective): RegExp {
  return new RegExp(`^\\s*${directive}=`);
}

function findSlot(lines: readonly string[], directive: ServiceDirective, source: string): number {
  const pattern = directivePattern(directive);
  const matches = lines.reduce<number[]>((acc, line, index) => (pattern.test(line) ? [...acc, index] : acc), []);
  const [slot] = matches;

  if (matches.length !== 1 || slot === undefined) {
    throw new PreconditionError(
      `${source} must contain exactly one ${directive}= line (found ${matches.length})`,
      `Restore ${source} from the release archive`,
    );
  }
  return slot;
}

export class ServiceTemplate {
  private readonly lines: readonly string[];
  private readonly slots: SlotIndex;

  private constructor(lines: readonly string[], slots: SlotIndex) {
    this.lines = lines;
    this.slots = slots;
  }

  /**
   * @param source file name used in error messages
   */
  static parse(text: string, source = 'service template'): ServiceTemplate {
    const lines = text.split('\n');
    return new ServiceTemplate(lines, {
      ExecStart: findSlot(lines, 'ExecStart', source),
      WorkingDirectory: findSlot(lines, 'WorkingDirectory', source),
      User: findSlot(lines, 'User', source),
    });
  }

  /**
   * Line number (0-based) of each slot
   */
  get slotLines(): Readonly<SlotIndex> {
    return this.slots;
  }

  render(descriptor: ServiceDescriptor): string {
    const values: Record<ServiceDirective, string> = {
      ExecStart: descriptor.execPath,
      WorkingDirectory: descriptor.workingDirectory,
      User: descriptor.runAsUser,
    };

    const rendered = [...this.lines];
    for (const directive of SERVICE_DIRECTIVES) {
      const index = this.slots[directive];
      const original = rendered[index] ?? '';
      const eol = original.endsWith('\r') ? '\r' : '';
      rendered[index] = `${directive}=${values[directive]}${eol}`;
    }
    return rendered.join('\n');
  }
}
