export * from './Presenter';
