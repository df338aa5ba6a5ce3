import Decimal from 'decimal.js';

// Audit entry for one inventory shrink.
// Shrinks model disposals outside the recorded history; no P&L is booked.
export interface AdjustmentRecord {
  id: string;                 // internal UUID
  base: string;
  quote: string;
  targetVolume: Decimal;
  previousVolume: Decimal;
  remainingVolume: Decimal;
  removedVolume: Decimal;     // zero when the target was at or above the open volume
  appliedAt: Date;
}
