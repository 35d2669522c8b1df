export * from './chunked-file-pusher.service';
export * from './file-transfer.service';
export * from './progress-reporter.service';
export * from './remote-file.operations';
