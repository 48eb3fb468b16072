/**
 * @file Public entry point of the MuTRiG controller model.
 */

export * from './errors';
export * from './config/types';
export * from './config/config';
export * from './config/config-validation';
export * from './config/config-loader';
export * from './config/bitstream-loader';
export * from './controller/constants';
export * from './controller/csr';
export * from './controller/field-layout';
export * from './controller/write-mask';
export * from './controller/handshake';
export * from './controller/cdc-channel';
export * from './controller/memory';
export * from './controller/routine';
export * from './controller/data-mover';
export * from './controller/pattern-modifier';
export * from './controller/config-writer';
export * from './controller/rate-monitor';
export * from './controller/writer-link';
export * from './controller/serial-domain';
export * from './controller/configuration-controller';
export * from './controller/scan-automation';
export * from './controller/instruction-interpreter';
export * from './controller/controller';
export * from './bus/burst-bus';
export * from './bus/burst-memory';
export * from './bus/counter-bank';
export * from './sim/sim-clock';
export * from './sim/spi-device';
export * from './sim/testbench';
export * from './report';
