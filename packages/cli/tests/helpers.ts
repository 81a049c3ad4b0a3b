import { Readable, Writable } from "stream";
import { CliStreams } from "../src/main";

export class Sink extends Writable {
    private chunks: string[] = [];

    _write(
        chunk: unknown,
        _encoding: BufferEncoding,
        callback: (error?: Error | null) => void,
    ): void {
        this.chunks.push(String(chunk));
        callback();
    }

    get text(): string {
        return this.chunks.join("");
    }
}

export function makeStreams(input: string = "") {
    const stdout = new Sink();
    const stderr = new Sink();
    const streams: CliStreams = {
        stdin: Readable.from([input]),
        stdout,
        stderr,
    };
    return { streams, stdout, stderr };
}
