import type { ViewMode } from '../config.js';
import { agendaView } from './agenda.js';
import { fourDayView } from './four-day.js';
import { monthView } from './month.js';
import type { ViewComposer } from './types.js';
import { twoWeekView } from './two-week.js';
import { weekView } from './week.js';

export const VIEW_COMPOSERS: Record<ViewMode, ViewComposer> = {
  two_week: twoWeekView,
  month: monthView,
  week: weekView,
  four_day: fourDayView,
  agenda: agendaView,
};

export type { ViewComposer, ViewInput } from './types.js';
