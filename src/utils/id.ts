import { v4 as uuidv4 } from 'uuid';

export const generateId = (prefix = '') => {
  const id = uuidv4().replace(/-/g, '').substring(0, 8);
  return prefix ? `${prefix}_${id}` : id;
};

export const generateQueryId = () => generateId('q');
