export * from './transcript.entity';
export * from './frame.entity';
