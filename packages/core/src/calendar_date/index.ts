export { CalendarDate, CALENDAR_DATE_FORMAT, compareNullableDates } from './calendar_date';
