import { ConfigError } from './errors.js';

export const mustBePositive = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number`, { [name]: value });
  }
};

export const mustBeRatio = (value: number, name: string): void => {
  if (!Number.isFinite(value) || value < 0 || value >= 1) {
    throw new ConfigError(`${name} must be in [0, 1)`, { [name]: value });
  }
};

export const mustBeNonEmpty = (value: string, name: string): void => {
  if (value.trim() === '') {
    throw new ConfigError(`${name} must not be empty`);
  }
};
