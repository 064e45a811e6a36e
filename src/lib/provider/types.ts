// Path: src/lib/provider/types.ts
// Secret store boundary

/**
 * Outcome of a create-or-update call
 */
export type SecretWriteResult = 'created' | 'updated';

/**
 * Item summary returned by listings
 */
export interface SecretSummary {
  id: string;
  title: string;
  category?: string;
}

/**
 * A resolved secret together with where it came from
 */
export interface SecretRecord {
  identifier: string;
  value: string;
  vault: string;
  account?: string;
  field: string;
}

/**
 * Access to an external secret store.
 *
 * Implementations throw NotSignedInError when no session is available and
 * SecretNotFoundError when the item or field does not exist.
 */
export interface SecretProvider {
  /** Backend account this provider talks to; undefined means the backend default */
  readonly account: string | undefined;

  /**
   * Map an alias (e.g. "work") to a backend account and verify the session.
   * @returns The resolved account id
   */
  ensureSignedIn(accountAlias?: string): Promise<string | undefined>;

  /** Raw value of one field of one item */
  fetchSecret(identifier: string, field: string, vault: string): Promise<string>;

  /** Item titles in a vault */
  listSecrets(vault: string): Promise<string[]>;

  createOrUpdateSecret(
    identifier: string,
    value: string,
    vault: string,
    category: string,
    field: string
  ): Promise<SecretWriteResult>;
}

/**
 * Result of running an external command
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Runs a command without a shell. Injected into CLI-backed providers so they
 * can be exercised without the real binary.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;
