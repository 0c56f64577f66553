import chalk from "chalk";
import { UsageStatus } from "../models/usage";

export interface Theme {
  heading: (value: string) => string;
  muted: (value: string) => string;
  error: (value: string) => string;
  status: (status: UsageStatus, value: string) => string;
}

function hasForceColor(): boolean {
  const force = process.env.FORCE_COLOR?.trim();
  return !!force && force !== "0";
}

export function shouldUseColor(stream: NodeJS.WriteStream = process.stdout): boolean {
  if (process.env.NO_COLOR && !hasForceColor()) {
    return false;
  }
  return hasForceColor() || !!stream.isTTY;
}

export function createTheme(rich: boolean): Theme {
  const color = new chalk.Instance({ level: rich ? 1 : 0 });

  return {
    heading: (value) => color.bold(value),
    muted: (value) => color.gray(value),
    error: (value) => color.red(value),
    status: (status, value) => {
      switch (status) {
        case "ok":
          return color.green(value);
        case "warning":
          return color.yellow(value);
        case "critical":
          return color.red(value);
        case "unknown":
        default:
          return value;
      }
    },
  };
}

export const plainTheme = createTheme(false);
