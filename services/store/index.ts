import { MemoryRecordStore } from './memory';
import { RecordStore } from './store';

export { MemoryRecordStore, RecordStore };
