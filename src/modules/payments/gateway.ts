/** Payment gateway seam used by the reservation workflow. Amounts are minor units. */

export type GatewayOrder = {
  orderId: string;
  /** Handed to the client SDK to complete the capture. */
  clientSecret: string;
  amountMinor: number;
  currency: string;
};

export type PaymentStatus = "captured" | "authorized" | "failed" | "pending";

export type GatewayPayment = {
  paymentId: string;
  orderId: string | null;
  amountMinor: number;
  status: PaymentStatus;
};

export interface PaymentGateway {
  /** Throws ExternalServiceError on timeout or gateway failure. */
  createOrder(input: { amountMinor: number; currency: string; receipt: string }): Promise<GatewayOrder>;
  /** null when the gateway has no such payment. */
  fetchPayment(paymentId: string): Promise<GatewayPayment | null>;
}
