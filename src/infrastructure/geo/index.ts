export { createGeoResolver, MaxmindGeoResolver, toGeoData } from './maxmind-resolver.js';
