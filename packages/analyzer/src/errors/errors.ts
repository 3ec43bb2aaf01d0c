const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeValue = (value: unknown): string => {
  if (typeof value === 'function') return value.name ? `class ${value.name}` : 'anonymous function';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
};

/**
 * A marker had to be constructed but at least one field has neither a
 * supplied value nor a default.
 */
export class MissingRequiredArgumentsError extends Error {
  constructor(
    public marker: string,
    public missing: string[],
    public target?: string
  ) {
    const where = target ? ` for ${target}` : '';
    const fields = missing.map((f) => `'${f}'`).join(', ');
    const dev = [
      `Cannot instantiate marker ${marker}${where}: missing required argument(s) ${fields}.`,
      '',
      ...(target
        ? [`No value was attached at ${target} and the field(s) declare no default.`]
        : ['The marker was instantiated with defaults but the field(s) declare no default.']),
      '',
      'To fix this:',
      `  1. Attach the marker explicitly: @Attach(${marker}, { ${missing[0] ?? 'field'}: ... })`,
      `  2. Or give the field a default in the marker's schema: z.string().default(...)`,
      `  3. Or mark the field optional: z.string().optional()`,
    ];
    super(format(`Missing required argument(s) ${fields} for marker ${marker}${where}.`, dev));
    this.name = 'MissingRequiredArgumentsError';
  }
}

export class UnknownMarkerArgumentsError extends Error {
  constructor(
    public marker: string,
    public unknown: string[],
    public target?: string
  ) {
    const where = target ? ` at ${target}` : '';
    const list = unknown.map((a) => `'${a}'`).join(', ');
    const dev = [
      `Unknown argument(s) ${list} for marker ${marker}${where}.`,
      '',
      `Marker ${marker} does not declare these fields. Positional arguments beyond the`,
      'last declared field are reported by position (#index).',
    ];
    super(format(`Unknown argument(s) ${list} for marker ${marker}${where}.`, dev));
    this.name = 'UnknownMarkerArgumentsError';
  }
}

export class InvalidMarkerArgumentsError extends Error {
  constructor(
    public marker: string,
    public issues: string[],
    public target?: string
  ) {
    const where = target ? ` at ${target}` : '';
    const dev = [
      `Invalid argument(s) for marker ${marker}${where}:`,
      '',
      ...issues.map((i) => `  - ${i}`),
    ];
    super(format(`Invalid argument(s) for marker ${marker}${where}.`, dev));
    this.name = 'InvalidMarkerArgumentsError';
  }
}

/**
 * A marker type that does not permit multiple values is attached more than
 * once to the same target.
 */
export class AmbiguousAttachmentError extends Error {
  constructor(
    public marker: string,
    public target: string,
    public count: number
  ) {
    const dev = [
      'Ambiguous marker attachment',
      '',
      `Marker ${marker} is attached ${count} times to ${target}.`,
      '',
      'To fix this:',
      '  1. Keep a single attachment',
      `  2. Or declare the marker multi-value: @Marker({ multiple: true }) (sub-markers only)`,
    ];
    super(format(`Marker ${marker} is attached ${count} times to ${target}.`, dev));
    this.name = 'AmbiguousAttachmentError';
  }
}

export class InvalidSubjectError extends Error {
  constructor(public subject: unknown) {
    const received = describeValue(subject);
    const dev = [
      'Invalid analysis subject',
      '',
      'Expected a class constructor or an object instance.',
      '',
      'Received:',
      `  ${received}`,
    ];
    super(format('Invalid analysis subject.', dev));
    this.name = 'InvalidSubjectError';
  }
}

export class InvalidDecoratorTargetError extends Error {
  constructor(
    public decorator: string,
    public reason: string
  ) {
    const dev = [`Invalid use of ${decorator}`, '', reason];
    super(format(`Invalid use of ${decorator}: ${reason}`, dev));
    this.name = 'InvalidDecoratorTargetError';
  }
}
