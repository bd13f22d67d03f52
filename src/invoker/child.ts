import type { Manifest } from "../content/model.js";
import type { ServiceSchema } from "../validation/schemas.js";
import type { AskResult, ChildDescriptor, ChildServiceProxy, QuestionOptions } from "./invoker.js";

/**
 * A child service as seen from one parent: its identity, the schema it
 * advertises and default question options (a per-child timeout, typically).
 */
export class Child implements ChildDescriptor {
  readonly id: string;
  readonly schema?: ServiceSchema;
  private readonly proxy: ChildServiceProxy;
  private readonly defaults: QuestionOptions;

  constructor(proxy: ChildServiceProxy, descriptor: ChildDescriptor, defaults: QuestionOptions = {}) {
    this.proxy = proxy;
    this.id = descriptor.id;
    if (descriptor.schema) {
      this.schema = descriptor.schema;
    }
    this.defaults = defaults;
  }

  ask(inputValues: unknown, inputManifest: Manifest | null = null, options: QuestionOptions = {}): Promise<AskResult> {
    return this.proxy.ask(this, inputValues, inputManifest, { ...this.defaults, ...options });
  }

  /** Sends without waiting; the returned correlation id feeds `awaitOutcome`/`poll`. */
  send(inputValues: unknown, inputManifest: Manifest | null = null, options: QuestionOptions = {}): Promise<string> {
    return this.proxy.sendQuestion(this, inputValues, inputManifest, { ...this.defaults, ...options });
  }
}
