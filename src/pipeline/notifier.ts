import axios from 'axios';
import { NotificationDispatchFailure, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';
import type { AlertDirection } from '../types';
import type { FiredAlert } from './alertEvaluator';

const log = createLogger('notifier');

export interface AlertNotification {
  to: string;
  subject: string;
  text: string;
  device_serial: string;
  direction: AlertDirection;
  temperature_c: number;
  threshold_c: number;
}

export interface NotificationTransport {
  send(notification: AlertNotification): Promise<void>;
}

export function composeAlertNotification(alert: FiredAlert, to: string): AlertNotification {
  const label = alert.device.name || alert.device.serial;
  const temp = alert.sample.tempInsideC.toFixed(1);
  const threshold = alert.thresholdC.toFixed(1);
  const high = alert.direction === 'HIGH';

  const subject = high
    ? `🔴 High Temperature Alert - ${label}`
    : `🔵 Low Temperature Alert - ${label}`;

  const text = [
    'Temperature alert for your thermostat device.',
    '',
    `Device: ${label}`,
    `Current Temperature: ${temp}°C`,
    high ? `High Threshold: ${threshold}°C` : `Low Threshold: ${threshold}°C`,
    '',
    high
      ? 'The temperature has exceeded your configured high threshold.'
      : 'The temperature has dropped below your configured low threshold.',
  ].join('\n');

  return {
    to,
    subject,
    text,
    device_serial: alert.device.serial,
    direction: alert.direction,
    temperature_c: alert.sample.tempInsideC,
    threshold_c: alert.thresholdC,
  };
}

/** Posts the notification to a mail relay; one attempt, bounded by `timeoutMs`. */
export class WebhookTransport implements NotificationTransport {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly from: string
  ) {}

  async send(notification: AlertNotification): Promise<void> {
    await axios.post(
      this.url,
      { from: this.from, ...notification },
      { timeout: this.timeoutMs, headers: { 'Content-Type': 'application/json' } }
    );
  }
}

/** Used when no relay is configured: the alert only reaches the log. */
export class LogTransport implements NotificationTransport {
  async send(notification: AlertNotification): Promise<void> {
    log.info({ to: notification.to, subject: notification.subject }, 'Alert notification (no relay configured)');
  }
}

export class Notifier {
  constructor(private readonly transport: NotificationTransport) {}

  /**
   * Sends one alert. Never rejects: a failed dispatch is logged and
   * reported as `false`, and nothing that led to the alert is undone.
   */
  async dispatch(alert: FiredAlert): Promise<boolean> {
    const recipient = alert.settings.recipientEmail ?? alert.device.ownerEmail;
    if (!recipient) {
      log.warn({ device: alert.device.serial }, 'No recipient email for device alerts');
      return false;
    }

    try {
      await this.transport.send(composeAlertNotification(alert, recipient));
      log.info(
        { device: alert.device.serial, direction: alert.direction, to: recipient },
        'Sent temperature alert'
      );
      return true;
    } catch (err) {
      const failure = new NotificationDispatchFailure(alert.device.serial, err);
      log.error(
        { device: alert.device.serial, direction: alert.direction, code: failure.code, err: errorMessage(err) },
        failure.message
      );
      return false;
    }
  }
}
