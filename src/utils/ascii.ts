import figlet from "figlet";

/**
 * Render a banner in the Standard figlet font.
 * Falls back to the plain message when rendering fails.
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch {
    return msg;
  }
};
