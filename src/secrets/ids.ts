export const SECRET_IDS = {
  telegramToken: 'worker/alerts/telegram/token',
  licenseToken: 'worker/license/token'
} as const;
