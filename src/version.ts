/** mimizuku のバージョン（package.json と揃える）。 */
export const VERSION = '0.1.0';

export const TOOL_NAME = `mimizuku v${VERSION}`;
