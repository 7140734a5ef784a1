export { DeferredFileWriter, DeferredFileWriterConfig } from './deferred-file-writer';
