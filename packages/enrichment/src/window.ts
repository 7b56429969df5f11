import { format, startOfMonth } from 'date-fns';
import type { DateWindow } from '@dugout/types';

/**
 * Default news window: first day of the current month through today.
 */
export function currentMonthWindow(now: Date): DateWindow {
    return {
        from: format(startOfMonth(now), 'yyyy-MM-dd'),
        to: format(now, 'yyyy-MM-dd'),
    };
}
