// utils/toast.ts
// The crew screens surface results as toasts. The host app installs its own
// handler; until then toasts are written to the console.

export type ToastType = 'success' | 'error' | 'info';

export interface ToastOptions {
  type: ToastType;
  text1: string;
  text2?: string;
}

export type ToastHandler = (options: ToastOptions) => void;

const consoleToastHandler: ToastHandler = ({ type, text1, text2 }) => {
  const line = text2 ? `${text1}: ${text2}` : text1;
  if (type === 'error') {
    console.error(`[toast] ${line}`);
  } else {
    console.log(`[toast] ${line}`);
  }
};

let activeHandler: ToastHandler = consoleToastHandler;

export const setToastHandler = (handler: ToastHandler | null): void => {
  activeHandler = handler ?? consoleToastHandler;
};

export const showToast = (options: ToastOptions): void => {
  activeHandler(options);
};
