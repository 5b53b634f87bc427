import { z } from 'zod';
import { UNITS } from '../ports/WeatherPort.js';

export const unitsSchema = z.enum(UNITS);

export const languageSchema = z
  .string()
  .regex(/^[a-z]{2}(_[a-z]{2})?$/i, 'expected a language code such as "en" or "zh_cn"')
  .transform((value) => value.toLowerCase());
