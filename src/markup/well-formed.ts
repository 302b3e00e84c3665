import { SaxesParser } from "saxes";

export interface WellFormedReport {
  wellFormed: boolean;
  errors: string[];
}

/**
 * Runs a conformant XML parser over `markup`. Canonical output of
 * `renderSsml` is expected to pass; the dialect's own parser is more lenient
 * in places (unknown entity references, for one).
 */
export const checkWellFormedXml = (markup: string): WellFormedReport => {
  const parser = new SaxesParser({ xmlns: false });
  const errors: string[] = [];

  parser.on("error", (error) => {
    errors.push(error.message);
  });

  parser.write(markup).close();

  return { wellFormed: errors.length === 0, errors };
};
