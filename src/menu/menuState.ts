import { differenceInMinutes, fromUnixTime } from 'date-fns';
import type { PunchSnapshot, PunchStatus } from '../services/punchState';

export type MenuItemId = 'clockIn' | 'clockOut';

export interface MenuItemState {
  label: string;
  enabled: boolean;
}

export interface MenuState {
  title: string;
  status: PunchStatus;
  timeClockedLabel: string;
  items: Record<MenuItemId, MenuItemState>;
}

export const EMPTY_TIME_CLOCKED = 'Time Clocked: --:--';

const titles: Record<PunchStatus, string> = {
  in: '⏱☑',
  out: '⏱☒',
  unknown: '⏱'
};

export const enabledActions = (status: PunchStatus): Record<MenuItemId, boolean> => ({
  clockIn: status !== 'in',
  clockOut: status !== 'out'
});

const pad = (value: number) => value.toString().padStart(2, '0');

export const formatTimeClocked = (snapshot: PunchSnapshot, now: Date): string => {
  if (snapshot.status !== 'in' || snapshot.clockInTime === null) {
    return EMPTY_TIME_CLOCKED;
  }
  const minutes = Math.max(0, differenceInMinutes(now, fromUnixTime(snapshot.clockInTime)));
  return `Time Clocked: ${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
};

export const deriveMenuState = (snapshot: PunchSnapshot, now: Date): MenuState => {
  const enabled = enabledActions(snapshot.status);
  return {
    title: titles[snapshot.status],
    status: snapshot.status,
    timeClockedLabel: formatTimeClocked(snapshot, now),
    items: {
      clockIn: { label: 'Clock In', enabled: enabled.clockIn },
      clockOut: { label: 'Clock Out', enabled: enabled.clockOut }
    }
  };
};
