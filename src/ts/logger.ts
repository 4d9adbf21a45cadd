export enum LogLevel {
    Debug,
    Info,
    Warn,
    Error,
    Silent,
}

export default class Logger {
    static logLevel: LogLevel = LogLevel.Info;

    static debug(...args: unknown[]): void {
        this.log(LogLevel.Debug, ...args);
    }

    static info(...args: unknown[]): void {
        this.log(LogLevel.Info, ...args);
    }

    static warn(...args: unknown[]): void {
        this.log(LogLevel.Warn, ...args);
    }

    static error(...args: unknown[]): void {
        this.log(LogLevel.Error, ...args);
    }

    static log(level: LogLevel, ...args: unknown[]): void {
        if (this.logLevel > level) {
            return;
        }

        switch (level) {
            case LogLevel.Debug: {
                console.debug('[geojson-inspector]', ...args);
                break;
            }
            case LogLevel.Info: {
                console.info('[geojson-inspector]', ...args);
                break;
            }
            case LogLevel.Warn: {
                console.warn('[geojson-inspector]', ...args);
                break;
            }
            case LogLevel.Error: {
                console.error('[geojson-inspector]', ...args);
                break;
            }
        }
    }
}
