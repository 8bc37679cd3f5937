export * from './sensor-data-source';
export * from './series-collector';
export * from './profile-loader';
