/**
 * @cruise-packager/notification
 * 
 * Delivers the packaging summary to the operators' mailing list.
 */

export {
  EmailNotifier,
  buildSummaryMessage,
  type NotificationConfig,
  type NotificationReceipt,
  type NotificationSink,
} from './emailNotifier.js';
