import type { GenerationPurpose, GenerationRequest, ModelTransport } from '../../src/services/modelTransport';

export type Responder = string | Error | ((request: GenerationRequest) => string | Promise<string>);

/**
 * In-process model stand-in. Queued responses are used first, in order, then the default for the
 * purpose; a call with neither fails the test loudly.
 */
export default class ScriptedTransport implements ModelTransport {
  public calls: GenerationRequest[] = [];

  private queues = new Map<GenerationPurpose, Responder[]>();

  private defaults = new Map<GenerationPurpose, Responder>();

  constructor(defaults: Partial<Record<GenerationPurpose, Responder>> = {}) {
    Object.entries(defaults).forEach(([purpose, responder]) => {
      if (isPurpose(purpose) && responder !== undefined) {
        this.defaults.set(purpose, responder);
      }
    });
  }

  enqueue(purpose: GenerationPurpose, ...responders: Responder[]): this {
    this.queues.set(purpose, [...(this.queues.get(purpose) ?? []), ...responders]);
    return this;
  }

  setDefault(purpose: GenerationPurpose, responder: Responder): this {
    this.defaults.set(purpose, responder);
    return this;
  }

  callsFor(purpose: GenerationPurpose): GenerationRequest[] {
    return this.calls.filter((call) => call.purpose === purpose);
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    const responder = this.queues.get(request.purpose)?.shift() ?? this.defaults.get(request.purpose);
    if (responder === undefined) {
      throw new Error(`No scripted response for ${request.purpose}`);
    }
    if (responder instanceof Error) {
      throw responder;
    }
    return typeof responder === 'function' ? responder(request) : responder;
  }
}

const PURPOSES: readonly string[] = [
  'analysis',
  'questions',
  'outline',
  'chapter',
  'critique',
  'extraction',
  'digest',
  'continuity',
];

function isPurpose(value: string): value is GenerationPurpose {
  return PURPOSES.includes(value);
}
