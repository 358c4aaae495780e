import nodemailer, { Transporter } from 'nodemailer';
import { appConfig, emailConfig } from '../connections/config/app.config';
import type { OrderStatusChange, OrderStatusListener } from '../modules/orders/order.manager';
import { toError } from './errors';
import type { Logger } from './logging';

export type MailTransport = Pick<Transporter, 'sendMail'>;

export interface MailSettings {
  from: string;
  enabled: boolean;
  frontendUrl: string;
}

export const createMailTransport = (): Transporter =>
  nodemailer.createTransport({
    host: emailConfig.host,
    port: emailConfig.port,
    secure: emailConfig.port === 465,
    auth: {
      user: emailConfig.user,
      pass: emailConfig.pass,
    },
  });

export const mailSettingsFromConfig = (): MailSettings => ({
  from: emailConfig.from,
  enabled: Boolean(emailConfig.user && emailConfig.pass),
  frontendUrl: appConfig.frontendUrl,
});

const STATUS_LABELS: Record<string, string> = {
  pending: 'Pending',
  paid: 'Payment received',
  processing: 'Being prepared',
  shipped: 'Shipped',
  delivered: 'Delivered',
  completed: 'Completed',
  cancelled: 'Cancelled',
  returned: 'Returned',
  refunded: 'Refunded',
};

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

export const renderOrderStatusEmail = (change: OrderStatusChange, frontendUrl: string) => {
  const { order, status, notes } = change;
  const label = STATUS_LABELS[status] ?? status;
  const greeting = order.customer_name ? `Hello ${order.customer_name},` : 'Hello,';
  const link = `${frontendUrl}/orders/${order.order_number}`;

  const text = [
    greeting,
    '',
    `Your order ${order.order_number} is now: ${label}.`,
    ...(notes ? [`Note: ${notes}`] : []),
    '',
    `Track your order at ${link}`,
  ].join('\n');

  const html = `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #333; border-bottom: 2px solid #667eea; padding-bottom: 10px;">
        Order #${escapeHtml(order.order_number)} update
      </h2>
      <p>${escapeHtml(greeting)}</p>
      <div style="background: #f5f5f5; padding: 15px; border-radius: 5px; margin: 20px 0; text-align: center;">
        <h3 style="margin: 0; color: #667eea; font-size: 24px;">${escapeHtml(label)}</h3>
      </div>
      ${notes ? `<p><strong>Note:</strong> ${escapeHtml(notes)}</p>` : ''}
      <p>Track your order <a href="${escapeHtml(link)}" style="color: #667eea;">here</a>.</p>
    </div>
  `;

  return {
    subject: `Order ${order.order_number}: ${label}`,
    text,
    html,
  };
};

/**
 * Emails the customer after each committed order status change. Delivery
 * problems are logged and swallowed; the status change stands.
 */
export class EmailOrderStatusNotifier implements OrderStatusListener {
  constructor(
    private readonly transport: MailTransport,
    private readonly settings: MailSettings,
    private readonly logger: Logger
  ) {}

  async onOrderStatusChanged(change: OrderStatusChange): Promise<void> {
    const { order } = change;

    if (!this.settings.enabled) {
      this.logger.debug('Email not configured, skipping order status update email', { orderNumber: order.order_number });
      return;
    }

    const message = renderOrderStatusEmail(change, this.settings.frontendUrl);
    try {
      await this.transport.sendMail({
        from: this.settings.from,
        to: order.email,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
      this.logger.info('Order status update email sent', {
        orderNumber: order.order_number,
        status: change.status,
        email: order.email,
      });
    } catch (error) {
      this.logger.error('Failed to send order status update email', {
        orderNumber: order.order_number,
        error: toError(error).message,
      });
    }
  }
}
