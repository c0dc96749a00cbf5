import Winston from 'winston';
import util from 'util';

export function createLogger(level = 'info'): Winston.Logger {
  return Winston.createLogger({
    level,
    format: Winston.format.combine(
      Winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss',
      }),
      Winston.format.printf(info => {
        const {timestamp, level, message, ...extraData} = info;
        return (
          `${timestamp} ${level}: ${message} ` +
          `${Object.keys(extraData).length ? util.format(extraData) : ''}`
        );
      })
    ),
    transports: [new Winston.transports.Console()],
  });
}
