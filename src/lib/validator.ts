import { body, param, validationResult } from 'express-validator';
import { Request, Response, NextFunction } from 'express';
import { DIGEST_ALGORITHMS, METADATA_SOURCE_KINDS, SIGNING_ALGORITHMS } from './constants';

function handleValidation(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return res.status(400).json({ errors: errors.array() });
  }
  next();
}

const serviceProviderOptional = [
  body('metadata_url').optional().isString(),
  body('description').optional().isString(),
  body('agreement_screen').optional().isBoolean().toBoolean(true),
  body('agreement_consent_form').optional().isBoolean().toBoolean(true),
  body('agreement_message').optional().isString(),
  body('signing_algorithm').optional().isIn(SIGNING_ALGORITHMS),
  body('digest_algorithm').optional().isIn(DIGEST_ALGORITHMS),
  body('disable_encrypted_assertions').optional().isBoolean().toBoolean(true),
  body('attribute_processor').optional().isString(),
  body('attribute_mapping').optional({ values: 'null' }).isString(),
  body('force_attribute_release').optional().isBoolean().toBoolean(true),
  body('is_active').optional().isBoolean().toBoolean(true)
];

const metadataStoreOptional = [
  body('url').optional({ values: 'null' }).isString(),
  body('file').optional({ values: 'null' }).isString(),
  body('kwargs').optional().isString(),
  body('is_active').optional().isBoolean().toBoolean(true)
];

export const validate = {
  id: [param('id').isString().notEmpty(), handleValidation],
  serviceProvider: [
    body('entity_id').isString().trim().notEmpty().isLength({ max: 254 }),
    body('display_name').isString().trim().notEmpty().isLength({ max: 254 }),
    ...serviceProviderOptional,
    handleValidation
  ],
  serviceProviderUpdate: [
    body('entity_id').optional().isString().trim().notEmpty().isLength({ max: 254 }),
    body('display_name').optional().isString().trim().notEmpty().isLength({ max: 254 }),
    ...serviceProviderOptional,
    handleValidation
  ],
  metadataStore: [
    body('name').isString().trim().notEmpty().isLength({ max: 256 }),
    body('type').isIn([...METADATA_SOURCE_KINDS]),
    ...metadataStoreOptional,
    handleValidation
  ],
  metadataStoreUpdate: [
    body('name').optional().isString().trim().notEmpty().isLength({ max: 256 }),
    body('type').optional().isIn([...METADATA_SOURCE_KINDS]),
    ...metadataStoreOptional,
    handleValidation
  ]
};
