/**
 * Payment Provider contract
 * What the orchestrator needs from an external processor.
 */

export interface InitializeChargeInput {
  readonly reference: string;
  /** Minor units */
  readonly amount: number;
  readonly email: string;
}

export interface InitializedCharge {
  readonly authorizationUrl: string;
}

/** Provider outcome reduced to what the transaction state machine understands */
export type ProviderChargeStatus = 'success' | 'failed' | 'pending';

export interface ChargeStatusReport {
  readonly reference: string;
  readonly status: ProviderChargeStatus;
  readonly amount: number;
  readonly paidAt: Date | null;
}

export interface PaymentProvider {
  readonly name: string;
  /** Throws ProviderError when the provider refuses or cannot be reached */
  initialize(input: InitializeChargeInput): Promise<InitializedCharge>;
  /** Throws ProviderError when the provider refuses or cannot be reached */
  query(reference: string): Promise<ChargeStatusReport>;
}

/**
 * Map a raw processor status onto the state machine.
 * Anything that is not conclusively settled stays pending.
 */
export function mapProviderStatus(raw: string): ProviderChargeStatus {
  switch (raw.toLowerCase()) {
    case 'success':
      return 'success';
    case 'failed':
    case 'reversed':
      return 'failed';
    default:
      return 'pending';
  }
}
