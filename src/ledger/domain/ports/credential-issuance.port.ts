import { ToolRunResult } from '../../../external-tools/utils/tool-output.util';

/**
 * Runs the credential network's issuance batch for all pending credentials.
 */
export abstract class CredentialIssuancePort {
  abstract issueCredentials(signal?: AbortSignal): Promise<ToolRunResult>;
}
