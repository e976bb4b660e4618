// Lightweight metrics collection system
export interface Metrics {
  requests: number;
  errors: number;
  reservationAttempts: number;
  reservationsReserved: number;
  reservationsInsufficientStock: number;
  reservationsTransientFailure: number;
  reservationsValidationFailed: number;
  reservationRetries: number;
  rollbacks: number;
  restores: number;
  ordersConfirmed: number;
  ordersCancelled: number;
  fsRetries: number;
}

function emptyMetrics(): Metrics {
  return {
    requests: 0,
    errors: 0,
    reservationAttempts: 0,
    reservationsReserved: 0,
    reservationsInsufficientStock: 0,
    reservationsTransientFailure: 0,
    reservationsValidationFailed: 0,
    reservationRetries: 0,
    rollbacks: 0,
    restores: 0,
    ordersConfirmed: 0,
    ordersCancelled: 0,
    fsRetries: 0,
  };
}

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }

  toJSON(): string {
    return JSON.stringify(this.metrics, null, 2);
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

// Helper functions for common metric increments
export const incrementRequests = () => metrics.increment('requests');
export const incrementErrors = () => metrics.increment('errors');
export const incrementReservationAttempts = () => metrics.increment('reservationAttempts');
export const incrementReservationRetries = () => metrics.increment('reservationRetries');
export const incrementRollbacks = () => metrics.increment('rollbacks');
export const incrementRestores = (count: number = 1) => metrics.increment('restores', count);
export const incrementOrdersConfirmed = () => metrics.increment('ordersConfirmed');
export const incrementOrdersCancelled = () => metrics.increment('ordersCancelled');
export const incrementFsRetries = () => metrics.increment('fsRetries');
