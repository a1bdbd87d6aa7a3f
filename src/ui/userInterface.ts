import type { Credentials } from '../config';
import type { MenuState } from '../menu/menuState';

export type NoticeKind = 'Status' | 'Success' | 'Info' | 'Error' | 'Session';

/** The dialogs, alerts and notifications the menu-bar shell offers. */
export interface UserInterface {
  /** Resolves null when the user cancels either field. Values are returned untrimmed. */
  promptCredentials(): Promise<Credentials | null>;
  promptTwoFactorCode(): Promise<string | null>;
  alert(message: string): void;
  notify(kind: NoticeKind, message: string): void;
  renderMenu(menu: MenuState): void;
}
