export {
  createNotifier,
  formatBackupReport,
  type NotificationMessage,
  type Notifier,
  notificationsEnabled,
  SmtpNotifier,
  sendBackupReport,
} from "./mailer";
