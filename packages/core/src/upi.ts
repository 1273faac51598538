/**
 * UPI payment-request URI builder.
 *
 * Generates `upi://pay` deep links that any UPI app can open, or that the
 * presentation layer encodes as a QR code at the exit kiosk.
 *
 * Format: upi://pay?pa=<vpa>&pn=<payeeName>&am=<amount>&cu=<currency>&tn=<note>
 */

const VPA_REGEX = /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+$/

export interface BuildUpiPaymentURIOptions {
  /** Payee virtual payment address (e.g. "parking@upi") */
  payeeVpa: string
  payeeName: string
  amount: number
  /** ISO 4217 code (default: "INR") */
  currency?: string
  /** Transaction note; the plate, so SMS confirmations can be matched back */
  note: string
}

/**
 * Build a UPI payment URI.
 *
 * Example output:
 *   upi://pay?pa=parking@upi&pn=ParkingLot&am=12.00&cu=INR&tn=MH12AB1234
 *
 * Throws when the VPA is malformed or the amount is not a positive number.
 */
export function buildUpiPaymentURI({
  payeeVpa,
  payeeName,
  amount,
  currency = 'INR',
  note,
}: BuildUpiPaymentURIOptions): string {
  if (!VPA_REGEX.test(payeeVpa)) {
    throw new Error(`Invalid UPI payee address: "${payeeVpa}"`)
  }
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new Error(`Invalid UPI amount: ${amount}`)
  }

  return (
    `upi://pay?pa=${payeeVpa}` +
    `&pn=${encodeURIComponent(payeeName)}` +
    `&am=${amount.toFixed(2)}` +
    `&cu=${currency.toUpperCase()}` +
    `&tn=${encodeURIComponent(note)}`
  )
}
