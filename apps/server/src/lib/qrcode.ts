import QRCode from "qrcode";
import { failure, success, type Result } from "./errors.js";

const QUIET_ZONE = 4;

type ModuleMatrix = ReturnType<typeof QRCode.create>["modules"];

function isCapacityError(error: unknown) {
  return error instanceof Error && /too big/i.test(error.message);
}

/**
 * Renders `uri` as an SVG QR code printed 50mm wide, one unit per module
 * plus a 4-module quiet zone.
 */
export function renderQrSvg(uri: string): Result<string> {
  let modules: ModuleMatrix;
  try {
    modules = QRCode.create(uri, { errorCorrectionLevel: "M" }).modules;
  } catch (error) {
    if (isCapacityError(error)) {
      return failure("QrEncodingCapacityExceeded", "Payload exceeds QR code capacity", error);
    }
    throw error;
  }

  const extent = modules.size + QUIET_ZONE * 2;
  const squares: string[] = [];
  for (let row = 0; row < modules.size; row += 1) {
    for (let col = 0; col < modules.size; col += 1) {
      if (modules.get(row, col)) {
        squares.push(`M ${col + QUIET_ZONE},${row + QUIET_ZONE} l 1,0 0,1 -1,0 z`);
      }
    }
  }

  return success(
    [
      `<svg xmlns="http://www.w3.org/2000/svg" version="1.1" width="50mm" height="50mm" viewBox="0 0 ${extent} ${extent}">`,
      `<rect width="${extent}" height="${extent}" fill="white"/>`,
      `<path fill="black" d="${squares.join(" ")}"/>`,
      "</svg>"
    ].join("\n")
  );
}

function escapeHtml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderEnrollmentPage(title: string, svg: string) {
  const safeTitle = escapeHtml(title);
  return `<!doctype html>
<html>
<head><meta charset="utf-8"><title>${safeTitle}</title></head>
<body>
<h1>${safeTitle}</h1>
${svg}
</body>
</html>
`;
}
