/**
 * Provisioning Adapter contract.
 *
 * The adapter turns a directory of rendered declarative files into real
 * infrastructure. The orchestrator never talks to the provisioning tool
 * directly; it goes through this interface, which tests replace with a stub
 * that records calls.
 *
 * Every method receives the child-process environment explicitly. Adapters
 * must not read credentials from `process.env`.
 *
 * @module
 */

/**
 * Tells the adapter that a remote resource already exists and should be
 * adopted into managed state rather than created again.
 */
export interface StateImportRecord {
  /** Resource address in the declarative files */
  readonly address: string;

  /** Provider-side identifier of the existing resource */
  readonly id: string;
}

/**
 * Output variables reported by the adapter, already unwrapped to values.
 */
export type OutputVariables = Record<string, unknown>;

export interface AdapterInvocation {
  /** Stage being provisioned, for error reporting */
  readonly stage: string;

  /** Absolute working directory with the stage's rendered files */
  readonly workdir: string;

  /** Complete environment for the child process */
  readonly env: Readonly<Record<string, string>>;
}

export interface AdapterVarsInvocation extends AdapterInvocation {
  /** Input variables for the stage's declarative files */
  readonly inputVars: Readonly<Record<string, unknown>>;
}

export interface ProvisioningAdapter {
  /** Prepares the working directory (providers, modules, backend). */
  init(invocation: AdapterInvocation): Promise<void>;

  /** Checks the rendered files without touching remote resources. */
  validate(invocation: AdapterInvocation): Promise<void>;

  /**
   * Adopts existing resources. Records whose address is already managed are
   * skipped. Returns the addresses actually imported.
   */
  importState(
    invocation: AdapterVarsInvocation & { readonly records: readonly StateImportRecord[] },
  ): Promise<string[]>;

  /** Creates or updates resources and returns the resulting outputs. */
  apply(invocation: AdapterVarsInvocation): Promise<OutputVariables>;

  /** Reads current outputs without changing anything. */
  output(invocation: AdapterInvocation): Promise<OutputVariables>;

  /** Removes every resource managed in the working directory. */
  destroy(invocation: AdapterVarsInvocation): Promise<void>;
}
