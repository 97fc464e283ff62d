import type { ConfigPage } from "@liveconf/core";

export interface CliWriters {
    writeStdout: (text: string) => void;
    writeStderr: (text: string) => void;
}

export function emitJson(writers: CliWriters, payload: unknown): void {
    writers.writeStdout(`${JSON.stringify(payload, null, 2)}\n`);
}

/** One compact JSON document per line, for streaming output. */
export function emitJsonLine(writers: CliWriters, payload: unknown): void {
    writers.writeStdout(`${JSON.stringify(payload)}\n`);
}

export function emitError(writers: CliWriters, token: string, message: string): void {
    writers.writeStderr(`${token} ${message}\n`);
}

export function summarizeSearchPage(page: ConfigPage): string {
    const header = `page ${page.pageNumber}/${page.pagesAvailable}, ${page.totalCount} config(s)`;
    const rows = page.pageItems.map((item) => `  ${item.dataId}\t${item.group}${item.appName ? `\t${item.appName}` : ""}`);
    return [header, ...rows].join("\n");
}
