export const NOTIFICATION_CATEGORIES = ["expedition", "incident", "reclamation", "paiement", "facture", "tournee", "system"] as const;
export type NotificationCategory = (typeof NOTIFICATION_CATEGORIES)[number];

export const NOTIFICATION_SEVERITIES = ["info", "warning", "error", "success"] as const;
export type NotificationSeverity = (typeof NOTIFICATION_SEVERITIES)[number];

/** What a domain event handler hands to the dispatcher. */
export type NotificationEvent = {
  category: NotificationCategory;
  severity: NotificationSeverity;
  title: string;
  message: string;
  client_id?: number | null;
  user_id?: number | null;
};

export type Notification = {
  id: number;
  category: NotificationCategory;
  severity: NotificationSeverity;
  title: string;
  message: string;
  client_id: number | null;
  user_id: number | null;
  read: boolean;
  read_at: string | null;
  created_at: string;
};

export type Paginated<T> = { items: T[]; total: number };
