// src/core/phrases.ts
// User-facing copy. Neutral register, no emojis.

export const PHRASES = {
  AUTH_REQUEST: "Введите пароль для доступа.",
  AUTH_SUCCESS: "Доступ разрешен.",
  AUTH_FAILED: "Неверный пароль. Попробуйте еще раз.",
  READY: "Бот готов к работе.",

  REMINDER_PROMPT: "Готов записать наблюдение?",
  REMINDER_CONFIGURED: "Напоминания настроены.",
  REMINDER_REQUEST: "Отправь расписание напоминаний в свободной форме.",
  TIMEZONE_QUESTION: "В каком часовом поясе вы находитесь?",
  TIMEZONE_CUSTOM: "Отправьте название часового пояса, например Europe/Riga.",
  TIMEZONE_INVALID: "Неизвестный часовой пояс",
  SCHEDULE_RECOGNIZED: "Распознано",
  SCHEDULE_PARSE_FAILED: "Не удалось распознать расписание. Попробуйте еще раз.",
  SCHEDULE_CURRENT: "Текущее расписание:",
  SCHEDULE_NEXT: "Следующее напоминание",
  SCHEDULE_NONE: "У вас нет настроенного расписания.",
  SCHEDULE_DISABLED: "Напоминания отключены.",
  SCHEDULE_TIME: "Время",
  SCHEDULE_DAYS: "Дни",

  ANSWER_HINT: "Отправь голосовое сообщение или напиши текст.",
  PRACTICE_CONFIRM_HINT: "Подтвердите ответ или добавьте что-то если необходимо.",
  PRACTICE_REVISIT_HINT: "Ранее записанный ответ. Оставьте его, дополните или перепишите.",
  PRACTICE_COMPLETE_PROMPT: "Завершить запись?",
  PRACTICE_SAVED: "Запись сохранена.",
  PRACTICE_CANCELLED: "Запись отменена.",
  AT_FIRST_FIELD: "Это первый шаг.",
  EMPTY_ANSWER: "Ответ пустой. Напишите текст или отправьте голосовое сообщение.",
  UNKNOWN_CHOICE: "Выберите один из предложенных вариантов.",
  NOT_READY: "Сначала заполните все шаги.",
  MISSING_FIELD: "Не все шаги заполнены. Вернитесь и дополните запись.",
  TRANSCRIPTION_FAILED: "Не удалось распознать голосовое сообщение. Попробуйте еще раз или напишите текстом.",
  ERROR_RETRY: "Произошла ошибка. Попробуйте еще раз.",
  ERROR_APOLOGY: "Извините, что-то пошло не так. Начните запись заново.",
  UNKNOWN_COMMAND: "Неизвестная команда.",

  EXPORT_PROMPT: "Выберите формат экспорта.",
  EXPORT_READY: "Вот записи за выбранный период.",
  EXPORT_EMPTY: "Записей пока нет.",
  DATA_CLEAR_CONFIRM: "Вы уверены? Все записи будут удалены без возможности восстановления.",
  DATA_CLEARED: "Все записи удалены.",
  DATA_CLEAR_CANCELLED: "Удаление отменено.",

  BTN_YES_GUIDED: "Да",
  BTN_NO: "Нет",
  BTN_OK: "Всё ок",
  BTN_REWRITE: "Переписать ответ",
  BTN_BACK: "Назад",
  BTN_COMPLETE: "Завершить",
  BTN_CANCEL_PRACTICE: "Прервать запись",
  BTN_CONFIRM: "Подтвердить",
  BTN_CANCEL: "Отмена",
  BTN_EXPORT_JSON: "JSON",
  BTN_EXPORT_TXT: "TXT",
  BTN_CONFIRM_DELETE: "Да, удалить всё",
  BTN_OTHER_TIMEZONE: "Другой часовой пояс",
} as const;

export const DAY_FILTER_LABELS = {
  all: "каждый день",
  weekdays: "по будням",
  weekends: "по выходным",
} as const;

export type TimezoneOption = { zone: string; label: string };

export const TIMEZONE_OPTIONS: readonly TimezoneOption[] = [
  { zone: "Europe/London", label: "UTC+0 — Лондон, Лиссабон, Касабланка" },
  { zone: "Europe/Berlin", label: "UTC+1 — Берлин, Париж, Рим, Мадрид" },
  { zone: "Europe/Kyiv", label: "UTC+2 — Киев, Каир, Калининград" },
  { zone: "Europe/Moscow", label: "UTC+3 — Москва, Стамбул, Найроби" },
  { zone: "Asia/Dubai", label: "UTC+4 — Дубай, Баку, Самара, Ереван" },
  { zone: "Asia/Tashkent", label: "UTC+5 — Екатеринбург, Ташкент, Карачи" },
  { zone: "Asia/Kolkata", label: "UTC+5:30 — Нью-Дели, Мумбаи, Калькутта" },
  { zone: "Asia/Almaty", label: "UTC+6 — Алматы, Дакка, Бишкек, Омск" },
  { zone: "Asia/Yangon", label: "UTC+6:30 — Янгон, Нейпьидо, Мандалай" },
  { zone: "Asia/Bangkok", label: "UTC+7 — Новосибирск, Бангкок, Джакарта" },
  { zone: "Asia/Shanghai", label: "UTC+8 — Иркутск, Гонконг, Сингапур" },
  { zone: "Asia/Tokyo", label: "UTC+9 — Якутск, Токио, Сеул" },
  { zone: "Australia/Adelaide", label: "UTC+9:30 — Аделаида, Дарвин" },
  { zone: "Australia/Sydney", label: "UTC+10 — Владивосток, Сидней, Мельбурн" },
  { zone: "Australia/Lord_Howe", label: "UTC+10:30 — остров Лорд-Хау" },
  { zone: "Asia/Magadan", label: "UTC+11 — Магадан, Сахалин, Нумеа" },
  { zone: "Pacific/Auckland", label: "UTC+12 — Петропавловск-Камчатский, Анадырь" },
  { zone: "Pacific/Tongatapu", label: "UTC+13 — Токелау, Нукуалофа, Апиа" },
  { zone: "Pacific/Kiritimati", label: "UTC+14 — Киритимати (Остров Рождества)" },
];
