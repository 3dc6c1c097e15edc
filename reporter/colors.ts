const codes = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
};

function colored(code: string): (text: string) => string {
  return (text) => `${code}${text}${codes.reset}`;
}

export const red = colored(codes.red);
export const green = colored(codes.green);
export const yellow = colored(codes.yellow);
export const blue = colored(codes.blue);
export const cyan = colored(codes.cyan);
