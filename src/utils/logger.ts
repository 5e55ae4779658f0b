import pino from 'pino';

// stdout carries the answers; log lines go to stderr
export const logger = pino({
  name: 'campus-schedule-bot',
  level: process.env.LOG_LEVEL || 'info'
}, pino.destination(2));
